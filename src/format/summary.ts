import type {
  JourneyDateRange,
  JourneySummary,
  ShareableJourneyExport,
  SummaryFormatOptions,
} from "./types.js";

export type DateRangeFormatter = (range: JourneyDateRange) => string;

/**
 * Builds the medium-style range formatter. Throws `RangeError` for an
 * unknown locale or time zone, whatever file is later formatted with it.
 */
export function createDateRangeFormatter(
  options: SummaryFormatOptions = {},
): DateRangeFormatter {
  const formatter = new Intl.DateTimeFormat(options.locale, {
    dateStyle: "medium",
    timeZone: options.timeZone,
  });
  return (range) => `${formatter.format(range.earliest)} - ${formatter.format(range.latest)}`;
}

export function formatDateRange(
  range: JourneyDateRange,
  options: SummaryFormatOptions = {},
): string {
  return createDateRangeFormatter(options)(range);
}

export function summarizeJourney(
  shareable: ShareableJourneyExport,
  formatRange: DateRangeFormatter = createDateRangeFormatter(),
): JourneySummary {
  const { exportData } = shareable;
  const summary: JourneySummary = {
    senderName: shareable.senderName,
    locationCount: exportData.totalLocations,
  };

  if (exportData.dateRange) {
    summary.dateRangeText = formatRange(exportData.dateRange);
  }
  return summary;
}
