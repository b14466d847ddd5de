import { describe, expect, it } from "vitest";
import { decode, parseJourneyFile } from "../src/format/decoder.js";
import {
  buildJourneyExport,
  encodeJourneyFile,
  encodeLegacyJourneyFile,
  formatTimestamp,
  shareableFilename,
} from "../src/format/journeyWriter.js";
import { MAGIC_HEADER_FILE } from "../src/format/magicHeaders.js";

const EXPORTED_AT = new Date("2025-06-04T08:00:00.000Z");

const SAMPLES = [
  { latitude: 45.5, longitude: -122.6, timestamp: new Date("2025-06-02T12:00:00.000Z") },
  { latitude: 47.6, longitude: -122.3, timestamp: new Date("2025-06-01T09:30:00.000Z") },
  { latitude: 37.7, longitude: -122.4, timestamp: new Date("2025-06-03T18:00:00.000Z") },
];

describe("journey writer", () => {
  it("builds an export with count and range from the samples", () => {
    const journey = buildJourneyExport(SAMPLES, EXPORTED_AT);

    expect(journey.totalLocations).toBe(3);
    expect(journey.locations.map((location) => location.latitude)).toEqual([
      45.5, 47.6, 37.7,
    ]);
    expect(journey.dateRange?.earliest.toISOString()).toBe("2025-06-01T09:30:00.000Z");
    expect(journey.dateRange?.latest.toISOString()).toBe("2025-06-03T18:00:00.000Z");
  });

  it("omits the range when there are no samples", () => {
    const journey = buildJourneyExport([], EXPORTED_AT);

    expect(journey).toStrictEqual({
      locations: [],
      exportDate: EXPORTED_AT,
      totalLocations: 0,
    });
  });

  it("writes whole-second UTC timestamps", () => {
    expect(formatTimestamp(new Date("2025-06-01T09:30:00.750Z"))).toBe(
      "2025-06-01T09:30:00Z",
    );
  });

  it("prefixes the v1 header by default", () => {
    const bytes = encodeJourneyFile(
      { senderName: "Sam", exportData: buildJourneyExport([], EXPORTED_AT) },
      { pretty: false },
    );

    expect(bytes.toString("utf-8")).toBe(
      'MAPPED_JOURNEY_V1\n{"senderName":"Sam","exportData":{"locations":[],"exportDate":"2025-06-04T08:00:00Z","totalLocations":0}}',
    );
  });

  it("writes headerless and alternate-header files", () => {
    const journey = buildJourneyExport([], EXPORTED_AT);

    expect(encodeLegacyJourneyFile(journey, { header: null, pretty: false }).toString("utf-8")).toBe(
      '{"locations":[],"exportDate":"2025-06-04T08:00:00Z","totalLocations":0}',
    );
    expect(
      encodeLegacyJourneyFile(journey, { header: MAGIC_HEADER_FILE })
        .toString("utf-8")
        .startsWith("MAPPED_JOURNEY_FILE\n{\n"),
    ).toBe(true);
  });

  it("produces files the decoder accepts", () => {
    const journey = buildJourneyExport(SAMPLES, EXPORTED_AT);

    const shareable = decode(encodeJourneyFile({ senderName: "Sam", exportData: journey }), {
      locale: "en-US",
      timeZone: "UTC",
    });
    expect(shareable).toStrictEqual({
      ok: true,
      value: {
        senderName: "Sam",
        locationCount: 3,
        dateRangeText: "Jun 1, 2025 - Jun 3, 2025",
      },
    });

    const legacy = parseJourneyFile(encodeLegacyJourneyFile(journey, { header: null }));
    expect(legacy.ok).toBe(true);
    if (legacy.ok) {
      expect(legacy.value.variant).toBe("legacy");
      expect(legacy.value.journey.exportData).toStrictEqual(journey);
    }
  });

  it("derives a safe shareable filename", () => {
    expect(shareableFilename("Alex Morgan")).toBe("Alex_Morgan_Journey.mapped");
    expect(shareableFilename("Zoë & Co.")).toBe("Zo__Co_Journey.mapped");
    expect(shareableFilename("")).toBe("_Journey.mapped");
  });
});
