import type {
  JourneyDateRange,
  JourneyExport,
  JourneyLocation,
  ShareableJourneyExport,
} from "./types.js";

// Internet date-time: full date, time, optional fraction, mandatory zone.
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-](\d{2}):(\d{2}))$/;

export class SchemaMismatch extends Error {
  constructor(path: string, expected: string) {
    super(`${path}: expected ${expected}`);
    this.name = "SchemaMismatch";
  }
}

type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isRecord(value)) {
    throw new SchemaMismatch(path, "object");
  }
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SchemaMismatch(path, "number");
  }
  return value;
}

function expectInteger(value: unknown, path: string): number {
  const parsed = expectNumber(value, path);
  if (!Number.isInteger(parsed)) {
    throw new SchemaMismatch(path, "integer");
  }
  return parsed;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new SchemaMismatch(path, "string");
  }
  return value;
}

function timestampField(match: RegExpExecArray, index: number): number {
  return Number(match[index] ?? "0");
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

// Date parsing rolls Feb 30 or 24:00 over into the next day; refuse those.
function isCalendarTimestamp(match: RegExpExecArray): boolean {
  const year = timestampField(match, 1);
  const month = timestampField(match, 2);
  const day = timestampField(match, 3);
  return (
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    timestampField(match, 4) <= 23 &&
    timestampField(match, 5) <= 59 &&
    timestampField(match, 6) <= 59 &&
    timestampField(match, 9) <= 23 &&
    timestampField(match, 10) <= 59
  );
}

export function parseTimestamp(value: unknown, path: string): Date {
  const raw = expectString(value, path);
  const match = TIMESTAMP_PATTERN.exec(raw);
  if (!match || !isCalendarTimestamp(match)) {
    throw new SchemaMismatch(path, "ISO-8601 timestamp");
  }

  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new SchemaMismatch(path, "ISO-8601 timestamp");
  }
  return date;
}

function readLocation(value: unknown, path: string): JourneyLocation {
  const object = expectObject(value, path);
  return {
    latitude: expectNumber(object.latitude, `${path}.latitude`),
    longitude: expectNumber(object.longitude, `${path}.longitude`),
    timestamp: parseTimestamp(object.timestamp, `${path}.timestamp`),
  };
}

export function readJourneyLocations(value: unknown, path = "$"): JourneyLocation[] {
  if (!Array.isArray(value)) {
    throw new SchemaMismatch(path, "array");
  }
  return value.map((entry, index) => readLocation(entry, `${path}[${index}]`));
}

function readDateRange(value: unknown, path: string): JourneyDateRange | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const object = expectObject(value, path);
  return {
    earliest: parseTimestamp(object.earliest, `${path}.earliest`),
    latest: parseTimestamp(object.latest, `${path}.latest`),
  };
}

export function readJourneyExport(value: unknown, path = "$"): JourneyExport {
  const object = expectObject(value, path);

  const journey: JourneyExport = {
    locations: readJourneyLocations(object.locations, `${path}.locations`),
    exportDate: parseTimestamp(object.exportDate, `${path}.exportDate`),
    totalLocations: expectInteger(object.totalLocations, `${path}.totalLocations`),
  };

  const dateRange = readDateRange(object.dateRange, `${path}.dateRange`);
  if (dateRange) {
    journey.dateRange = dateRange;
  }
  return journey;
}

export function readShareableJourneyExport(
  value: unknown,
  path = "$",
): ShareableJourneyExport {
  const object = expectObject(value, path);
  return {
    senderName: expectString(object.senderName, `${path}.senderName`),
    exportData: readJourneyExport(object.exportData, `${path}.exportData`),
  };
}
