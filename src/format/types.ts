export interface JourneyLocation {
  latitude: number;
  longitude: number;
  timestamp: Date;
}

export interface JourneyDateRange {
  earliest: Date;
  latest: Date;
}

export interface JourneyExport {
  locations: JourneyLocation[];
  exportDate: Date;
  totalLocations: number;
  dateRange?: JourneyDateRange;
}

export interface ShareableJourneyExport {
  senderName: string;
  exportData: JourneyExport;
}

export type JourneySchemaVariant = "shareable" | "legacy";

export interface JourneySummary {
  senderName: string;
  locationCount: number;
  dateRangeText?: string;
}

export interface SummaryFormatOptions {
  locale?: string;
  timeZone?: string;
}
