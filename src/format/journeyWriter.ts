import { MAGIC_HEADER_V1, type MagicHeader } from "./magicHeaders.js";
import type {
  JourneyExport,
  JourneyLocation,
  ShareableJourneyExport,
} from "./types.js";

export const JOURNEY_FILE_EXTENSION = ".mapped";

export interface JourneyFileEncodeOptions {
  header?: MagicHeader | null;
  pretty?: boolean;
}

interface LocationJson {
  latitude: number;
  longitude: number;
  timestamp: string;
}

interface JourneyExportJson {
  locations: LocationJson[];
  exportDate: string;
  totalLocations: number;
  dateRange?: { earliest: string; latest: string };
}

// Whole seconds only: strict internet date-time readers reject fractions.
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function buildJourneyExport(
  samples: JourneyLocation[],
  exportDate: Date,
): JourneyExport {
  const journey: JourneyExport = {
    locations: samples.map((sample) => ({ ...sample })),
    exportDate,
    totalLocations: samples.length,
  };

  if (samples.length > 0) {
    let earliest = Number.POSITIVE_INFINITY;
    let latest = Number.NEGATIVE_INFINITY;
    for (const sample of samples) {
      const time = sample.timestamp.getTime();
      earliest = Math.min(earliest, time);
      latest = Math.max(latest, time);
    }
    journey.dateRange = { earliest: new Date(earliest), latest: new Date(latest) };
  }

  return journey;
}

function journeyToJson(journey: JourneyExport): JourneyExportJson {
  const json: JourneyExportJson = {
    locations: journey.locations.map((location) => ({
      latitude: location.latitude,
      longitude: location.longitude,
      timestamp: formatTimestamp(location.timestamp),
    })),
    exportDate: formatTimestamp(journey.exportDate),
    totalLocations: journey.totalLocations,
  };

  if (journey.dateRange) {
    json.dateRange = {
      earliest: formatTimestamp(journey.dateRange.earliest),
      latest: formatTimestamp(journey.dateRange.latest),
    };
  }
  return json;
}

function encodeWithHeader(body: unknown, options: JourneyFileEncodeOptions): Buffer {
  const header = options.header === undefined ? MAGIC_HEADER_V1 : options.header;
  const pretty = options.pretty ?? true;
  const text = pretty ? JSON.stringify(body, null, 2) : JSON.stringify(body);

  return Buffer.from(`${header ?? ""}${text}`, "utf-8");
}

export function encodeJourneyFile(
  shareable: ShareableJourneyExport,
  options: JourneyFileEncodeOptions = {},
): Buffer {
  return encodeWithHeader(
    {
      senderName: shareable.senderName,
      exportData: journeyToJson(shareable.exportData),
    },
    options,
  );
}

export function encodeLegacyJourneyFile(
  journey: JourneyExport,
  options: JourneyFileEncodeOptions = {},
): Buffer {
  return encodeWithHeader(journeyToJson(journey), options);
}

export function shareableFilename(senderName: string): string {
  const sanitized = senderName.replace(/ /g, "_").replace(/[^A-Za-z0-9_]/g, "");
  return `${sanitized}_Journey${JOURNEY_FILE_EXTENSION}`;
}
