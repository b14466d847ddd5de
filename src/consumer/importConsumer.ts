import { extname } from "node:path";
import { type LogSink, consoleLogSink } from "../core/log.js";
import { parseJourneyFile } from "../format/decoder.js";
import { unwrapJsonEnvelope } from "../format/envelope.js";
import { stripMagicHeader } from "../format/magicHeaders.js";
import type { JourneyExport, JourneySchemaVariant } from "../format/types.js";
import type { StagingChannel } from "../staging/stagingChannel.js";

export interface PendingJourneyImport {
  senderName: string;
  journey: JourneyExport;
  variant: JourneySchemaVariant;
  filename: string;
}

export type ImportOutcome =
  | { status: "empty" }
  | {
      status: "rejected";
      reason: "unsupported_extension" | "not_a_journey_file";
      filename: string;
      message: string;
    }
  | {
      status: "imported";
      senderName: string;
      locationCount: number;
      variant: JourneySchemaVariant;
      filename: string;
    };

export interface ImportConsumerOptions {
  channel: StagingChannel;
  onImport(pending: PendingJourneyImport): Promise<void> | void;
  log?: LogSink;
}

export interface ImportConsumer {
  consumePending(): Promise<ImportOutcome>;
}

export type ImportFileKind = "journey" | "json-envelope";

export function classifyImportFilename(filename: string): ImportFileKind | null {
  const extension = extname(filename).toLowerCase();
  if (extension === ".mapped") {
    return "journey";
  }

  if (extension === ".json" && filename.includes(".mapped.json")) {
    return "json-envelope";
  }
  return null;
}

export function createImportConsumer(options: ImportConsumerOptions): ImportConsumer {
  const log = options.log ?? consoleLogSink;

  async function consumeOnce(): Promise<ImportOutcome> {
    const record = await options.channel.takeStaged();
    if (!record) {
      return { status: "empty" };
    }

    const { filename } = record;
    const kind = classifyImportFilename(filename);
    if (!kind) {
      log({ level: "warn", event: "import.unsupported_extension", filename });
      return {
        status: "rejected",
        reason: "unsupported_extension",
        filename,
        message: `Not a journey file name: ${filename}`,
      };
    }

    let payload = record.payload;
    if (kind === "json-envelope") {
      payload = unwrapJsonEnvelope(stripMagicHeader(payload).payload);
    }

    // The filename and payload keys are written separately, so the payload
    // must decode on its own before the pairing is trusted.
    const parsed = parseJourneyFile(payload);
    if (!parsed.ok) {
      log({
        level: "warn",
        event: "import.rejected",
        filename,
        message: parsed.error.message,
      });
      return {
        status: "rejected",
        reason: "not_a_journey_file",
        filename,
        message: parsed.error.message,
      };
    }

    const { journey, variant } = parsed.value;
    await options.onImport({
      senderName: journey.senderName,
      journey: journey.exportData,
      variant,
      filename,
    });

    log({
      level: "info",
      event: "import.imported",
      filename,
      variant,
      senderName: journey.senderName,
      locationCount: journey.exportData.totalLocations,
    });

    return {
      status: "imported",
      senderName: journey.senderName,
      locationCount: journey.exportData.totalLocations,
      variant,
      filename,
    };
  }

  // takeStaged reads before it clears, so overlapping calls would both see
  // the same record; each call waits for the previous one to settle.
  let tail: Promise<unknown> = Promise.resolve();

  return {
    consumePending() {
      const outcome = tail.then(consumeOnce);
      tail = outcome.catch(() => undefined);
      return outcome;
    },
  };
}
