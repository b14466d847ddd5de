#!/usr/bin/env node

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { createImportConsumer } from "../consumer/importConsumer.js";
import { createWakeListenerServer } from "../consumer/wakeListener.js";
import { readJourneySummary } from "../format/decoder.js";
import { readJourneyLocations } from "../format/journeySchema.js";
import {
  buildJourneyExport,
  encodeJourneyFile,
  encodeLegacyJourneyFile,
  shareableFilename,
} from "../format/journeyWriter.js";
import { openFromPreview } from "../host/previewEntryPoint.js";
import { handleSharedFile } from "../host/shareEntryPoint.js";
import { createStagingChannel } from "../staging/stagingChannel.js";
import {
  type HandoffCliOptions,
  HelpRequested,
  absolutizePath,
  createWakeSignalFromOptions,
  openSharedStoreFromOptions,
  parseHandoffCliOptions,
} from "./options.js";

function printHelp(): void {
  const lines = [
    "journey-handoff - journey file decoding and cross-process staging",
    "",
    "Usage:",
    "  journey-handoff preview <file>     Decode a journey file and print its summary",
    "  journey-handoff share <file>       Stage a .mapped file for the consuming app",
    "  journey-handoff open <file>        Stage any previewed file (no extension check)",
    "  journey-handoff take [--output <path>]",
    "                                     Consume the pending staged file, if any",
    "  journey-handoff listen             Serve wake signals and consume on each one",
    "  journey-handoff export --sender <name> --samples <samples.json>",
    "                                     Write a journey file from location samples",
    "",
    "Environment variables:",
    "  JOURNEY_HANDOFF_STORE_DIR      Shared store root (default: ~/.journey-handoff/shared)",
    "  JOURNEY_HANDOFF_SHARING_GROUP  Sharing group id (default: group.mapped.journeys)",
    "  JOURNEY_HANDOFF_GCS_BUCKET     Use a Cloud Storage bucket as the shared store",
    "  JOURNEY_HANDOFF_GCS_PREFIX     Object prefix inside the bucket",
    "  JOURNEY_HANDOFF_WAKE_URL       Base URL of a running `listen` process",
    "  JOURNEY_HANDOFF_WAKE_COMMAND   Opener command invoked with the wake URI",
    "  JOURNEY_HANDOFF_WAKE_URI       Wake URI (default: mapped://import)",
    "  JOURNEY_HANDOFF_LOCALE         Locale for preview date ranges",
    "  JOURNEY_HANDOFF_TIME_ZONE      Time zone for preview date ranges",
    "  PORT                           Listen port (default: 8788)",
    "",
    "Options:",
    "  --store-dir <dir>  --sharing-group <id>  --gcs-bucket <name>  --gcs-prefix <prefix>",
    "  --wake-url <url>  --wake-command <cmd>  --wake-uri <uri>",
    "  --locale <tag>  --time-zone <zone>  --host <host>  --port <n>",
    "  --output <path>  --output-dir <dir>  --sender <name>  --samples <path>  --no-header",
    "  --help",
  ];

  process.stdout.write(`${lines.join("\n")}\n`);
}

function requirePositional(options: HandoffCliOptions, label: string): string {
  const value = options.positionals[1];
  if (!value) {
    throw new Error(`Missing ${label}.`);
  }
  return value;
}

async function openChannel(options: HandoffCliOptions) {
  const store = await openSharedStoreFromOptions(options);
  return createStagingChannel({
    store,
    wake: createWakeSignalFromOptions(options),
    wakeUri: options.wakeUri,
  });
}

async function runPreview(options: HandoffCliOptions): Promise<void> {
  const path = absolutizePath(requirePositional(options, "<file>"));
  const result = await readJourneySummary(path, {
    locale: options.locale,
    timeZone: options.timeZone,
  });

  if (!result.ok) {
    console.log(
      JSON.stringify({ ok: false, kind: result.error.kind, message: result.error.message }, null, 2),
    );
    process.exitCode = 2;
    return;
  }

  console.log(JSON.stringify({ ok: true, ...result.value }, null, 2));
}

async function runShare(options: HandoffCliOptions, checkExtension: boolean): Promise<void> {
  const path = absolutizePath(requirePositional(options, "<file>"));
  const channel = await openChannel(options);
  const outcome = checkExtension
    ? await handleSharedFile({ path, channel })
    : await openFromPreview({ path, channel });

  console.log(JSON.stringify(outcome, null, 2));
  if (!outcome.ok) {
    process.exitCode = 2;
  }
}

async function runTake(options: HandoffCliOptions): Promise<void> {
  const channel = await openChannel(options);
  const consumer = createImportConsumer({
    channel,
    onImport: async (pending) => {
      if (!options.output) {
        return;
      }
      const outputPath = absolutizePath(options.output);
      await writeFile(
        outputPath,
        encodeJourneyFile({ senderName: pending.senderName, exportData: pending.journey }),
      );
    },
  });

  const outcome = await consumer.consumePending();
  console.log(JSON.stringify(outcome, null, 2));
  if (outcome.status === "rejected") {
    process.exitCode = 2;
  }
}

async function runListen(options: HandoffCliOptions): Promise<void> {
  const channel = await openChannel(options);
  const consumer = createImportConsumer({ channel, onImport: () => {} });

  // A wake signal may have been lost while nothing was listening.
  const initial = await consumer.consumePending();

  const server = createWakeListenerServer({ consumer, wakeUri: options.wakeUri });
  await new Promise<void>((resolve, reject) => {
    server.listen(options.port, options.host, () => resolve());
    server.on("error", reject);
  });

  console.log(
    JSON.stringify(
      {
        ok: true,
        listening: true,
        host: options.host,
        port: options.port,
        wakeUri: options.wakeUri,
        initial,
      },
      null,
      2,
    ),
  );
}

async function runExport(options: HandoffCliOptions): Promise<void> {
  if (!options.samples) {
    throw new Error("Missing --samples <samples.json>.");
  }

  const samplesPath = absolutizePath(options.samples);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(samplesPath, "utf-8"));
  } catch {
    throw new Error(`Invalid samples file ${samplesPath}: not valid JSON.`);
  }

  const journey = buildJourneyExport(readJourneyLocations(raw), new Date());
  const header = options.header ? undefined : null;
  const bytes = options.sender
    ? encodeJourneyFile({ senderName: options.sender, exportData: journey }, { header })
    : encodeLegacyJourneyFile(journey, { header });

  const outputDir = absolutizePath(options.outputDir);
  await mkdir(outputDir, { recursive: true });
  const outputPath = join(outputDir, shareableFilename(options.sender ?? "Friend"));
  await writeFile(outputPath, bytes);

  console.log(
    JSON.stringify(
      {
        ok: true,
        path: outputPath,
        bytes: bytes.byteLength,
        totalLocations: journey.totalLocations,
      },
      null,
      2,
    ),
  );
}

async function main(): Promise<void> {
  const options = parseHandoffCliOptions(process.argv.slice(2), process.env);
  const command = options.positionals[0];

  if (command === "preview") {
    await runPreview(options);
    return;
  }

  if (command === "share") {
    await runShare(options, true);
    return;
  }

  if (command === "open") {
    await runShare(options, false);
    return;
  }

  if (command === "take") {
    await runTake(options);
    return;
  }

  if (command === "listen") {
    await runListen(options);
    return;
  }

  if (command === "export") {
    await runExport(options);
    return;
  }

  printHelp();
  process.exitCode = command ? 2 : 0;
}

main().catch((error) => {
  if (error instanceof HelpRequested) {
    printHelp();
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exitCode = 2;
});
