import { readFile } from "node:fs/promises";
import { JourneyHandoffError, type Result, errorMessage } from "../core/errors.js";
import {
  SchemaMismatch,
  readJourneyExport,
  readShareableJourneyExport,
} from "./journeySchema.js";
import { type MagicHeader, stripMagicHeader } from "./magicHeaders.js";
import {
  type DateRangeFormatter,
  createDateRangeFormatter,
  summarizeJourney,
} from "./summary.js";
import type {
  JourneySchemaVariant,
  JourneySummary,
  ShareableJourneyExport,
  SummaryFormatOptions,
} from "./types.js";

export const LEGACY_SENDER_NAME = "Friend";

interface SchemaAttempt {
  variant: JourneySchemaVariant;
  decode(json: unknown): ShareableJourneyExport;
}

const SCHEMA_ATTEMPTS: readonly SchemaAttempt[] = [
  {
    variant: "shareable",
    decode: (json) => readShareableJourneyExport(json),
  },
  {
    variant: "legacy",
    decode: (json) => ({
      senderName: LEGACY_SENDER_NAME,
      exportData: readJourneyExport(json),
    }),
  },
];

export interface ParsedJourneyFile {
  variant: JourneySchemaVariant;
  header?: MagicHeader;
  journey: ShareableJourneyExport;
}

function notAJourneyFile(reasons: string[]): { ok: false; error: JourneyHandoffError } {
  return {
    ok: false,
    error: new JourneyHandoffError(
      "not_a_journey_file",
      `Not a valid journey file (${reasons.join("; ")})`,
    ),
  };
}

export function parseJourneyFile(bytes: Uint8Array): Result<ParsedJourneyFile> {
  const { payload, header } = stripMagicHeader(bytes);

  let json: unknown;
  try {
    json = JSON.parse(payload.toString("utf-8"));
  } catch (error) {
    return notAJourneyFile([`json: ${errorMessage(error)}`]);
  }

  const reasons: string[] = [];
  for (const attempt of SCHEMA_ATTEMPTS) {
    try {
      const journey = attempt.decode(json);
      return {
        ok: true,
        value: { variant: attempt.variant, header, journey },
      };
    } catch (error) {
      if (!(error instanceof SchemaMismatch)) {
        throw error;
      }
      reasons.push(`${attempt.variant}: ${error.message}`);
    }
  }

  return notAJourneyFile(reasons);
}

/**
 * Decodes a journey file into its summary. Content problems come back as
 * `not_a_journey_file`; an unknown locale or time zone in `options` throws
 * `RangeError` before any bytes are looked at.
 */
export function decode(
  bytes: Uint8Array,
  options: SummaryFormatOptions = {},
): Result<JourneySummary> {
  return summarizeBytes(bytes, createDateRangeFormatter(options));
}

function summarizeBytes(
  bytes: Uint8Array,
  formatRange: DateRangeFormatter,
): Result<JourneySummary> {
  const parsed = parseJourneyFile(bytes);
  if (!parsed.ok) {
    return parsed;
  }

  return { ok: true, value: summarizeJourney(parsed.value.journey, formatRange) };
}

export async function readJourneySummary(
  path: string,
  options: SummaryFormatOptions = {},
): Promise<Result<JourneySummary>> {
  const formatRange = createDateRangeFormatter(options);
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    return {
      ok: false,
      error: new JourneyHandoffError(
        "unreadable_input",
        `Failed to read ${path}: ${errorMessage(error)}`,
        { cause: error },
      ),
    };
  }

  return summarizeBytes(bytes, formatRange);
}
