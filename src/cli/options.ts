import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { errorMessage } from "../core/errors.js";
import { openFileSharedStore } from "../staging/fileSharedStore.js";
import { openGcsSharedStore } from "../staging/gcsSharedStore.js";
import { DEFAULT_SHARING_GROUP, DEFAULT_WAKE_URI } from "../staging/keys.js";
import type { SharedKeyValueStore } from "../staging/sharedStore.js";
import {
  type WakeSignal,
  createCommandWakeSignal,
  createHttpWakeSignal,
} from "../staging/wakeSignal.js";

export interface HandoffCliOptions {
  positionals: string[];
  storeDir: string;
  sharingGroup: string;
  gcsBucket?: string;
  gcsPrefix?: string;
  wakeUrl?: string;
  wakeCommand?: string;
  wakeUri: string;
  locale?: string;
  timeZone?: string;
  port: number;
  host: string;
  output?: string;
  outputDir: string;
  sender?: string;
  samples?: string;
  header: boolean;
}

export class HelpRequested extends Error {
  constructor() {
    super("help");
    this.name = "HelpRequested";
  }
}

function expandHome(rawPath: string): string {
  if (rawPath.startsWith("~/")) {
    return join(homedir(), rawPath.slice(2));
  }

  return rawPath;
}

export function absolutizePath(rawPath: string): string {
  const expanded = expandHome(rawPath);
  return isAbsolute(expanded) ? expanded : resolve(process.cwd(), expanded);
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function assertDateFormatOptions(options: HandoffCliOptions): void {
  try {
    new Intl.DateTimeFormat(options.locale);
  } catch (error) {
    throw new Error(`Invalid --locale: ${options.locale} (${errorMessage(error)})`);
  }

  try {
    new Intl.DateTimeFormat(undefined, { timeZone: options.timeZone });
  } catch (error) {
    throw new Error(`Invalid --time-zone: ${options.timeZone} (${errorMessage(error)})`);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

const VALUE_FLAGS = {
  "--store-dir": "storeDir",
  "--sharing-group": "sharingGroup",
  "--gcs-bucket": "gcsBucket",
  "--gcs-prefix": "gcsPrefix",
  "--wake-url": "wakeUrl",
  "--wake-command": "wakeCommand",
  "--wake-uri": "wakeUri",
  "--locale": "locale",
  "--time-zone": "timeZone",
  "--host": "host",
  "--output": "output",
  "--output-dir": "outputDir",
  "--sender": "sender",
  "--samples": "samples",
} as const satisfies Record<string, keyof HandoffCliOptions>;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

export function parseHandoffCliOptions(
  argv: string[],
  env: NodeJS.ProcessEnv,
): HandoffCliOptions {
  const options: HandoffCliOptions = {
    positionals: [],
    storeDir:
      nonEmpty(env.JOURNEY_HANDOFF_STORE_DIR) ??
      join(homedir(), ".journey-handoff", "shared"),
    sharingGroup: nonEmpty(env.JOURNEY_HANDOFF_SHARING_GROUP) ?? DEFAULT_SHARING_GROUP,
    gcsBucket: nonEmpty(env.JOURNEY_HANDOFF_GCS_BUCKET),
    gcsPrefix: nonEmpty(env.JOURNEY_HANDOFF_GCS_PREFIX),
    wakeUrl: nonEmpty(env.JOURNEY_HANDOFF_WAKE_URL),
    wakeCommand: nonEmpty(env.JOURNEY_HANDOFF_WAKE_COMMAND),
    wakeUri: nonEmpty(env.JOURNEY_HANDOFF_WAKE_URI) ?? DEFAULT_WAKE_URI,
    locale: nonEmpty(env.JOURNEY_HANDOFF_LOCALE),
    timeZone: nonEmpty(env.JOURNEY_HANDOFF_TIME_ZONE),
    port: parseNumber(env.PORT) ?? 8788,
    host: "127.0.0.1",
    outputDir: ".",
    header: true,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      throw new HelpRequested();
    }

    if (arg === "--no-header") {
      options.header = false;
      continue;
    }

    if (arg === "--port") {
      options.port = Number(argv[i + 1]);
      i += 1;
      continue;
    }

    if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      options[VALUE_FLAGS[arg]] = value;
      i += 1;
      continue;
    }

    if (arg.startsWith("--")) {
      throw new Error(`Unknown arg: ${arg}`);
    }

    options.positionals.push(arg);
  }

  if (!Number.isFinite(options.port) || options.port < 0) {
    throw new Error(`Invalid --port: ${options.port}`);
  }

  assertDateFormatOptions(options);

  return options;
}

export function openSharedStoreFromOptions(
  options: HandoffCliOptions,
): Promise<SharedKeyValueStore> {
  if (options.gcsBucket?.trim()) {
    return openGcsSharedStore({
      bucket: options.gcsBucket,
      prefix: options.gcsPrefix,
      sharingGroup: options.sharingGroup,
    });
  }

  return openFileSharedStore({
    rootDir: absolutizePath(options.storeDir),
    sharingGroup: options.sharingGroup,
  });
}

export function createWakeSignalFromOptions(
  options: HandoffCliOptions,
): WakeSignal | undefined {
  if (options.wakeUrl?.trim()) {
    return createHttpWakeSignal({ url: options.wakeUrl });
  }

  if (options.wakeCommand?.trim()) {
    return createCommandWakeSignal({ command: options.wakeCommand });
  }

  return undefined;
}
