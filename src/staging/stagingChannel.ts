import { JourneyHandoffError, errorMessage } from "../core/errors.js";
import { type LogSink, consoleLogSink } from "../core/log.js";
import {
  DEFAULT_PENDING_FILENAME,
  DEFAULT_WAKE_URI,
  PENDING_IMPORT_DATA_KEY,
  PENDING_IMPORT_FILENAME_KEY,
} from "./keys.js";
import type { SharedKeyValueStore } from "./sharedStore.js";
import type { WakeSignal } from "./wakeSignal.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export interface StagingChannelOptions {
  store: SharedKeyValueStore;
  wake?: WakeSignal;
  wakeUri?: string;
  log?: LogSink;
}

export type WakeStatus = "delivered" | "failed" | "skipped";

export interface StageResult {
  stagedBytes: number;
  filename: string;
  wake: WakeStatus;
  wakeError?: string;
}

export interface StagedRecord {
  payload: Buffer;
  filename: string;
}

/**
 * Single-slot handoff between a short-lived producer and a long-lived
 * consumer. Every `stage` replaces whatever is pending; an unconsumed record
 * is dropped without notice.
 */
export interface StagingChannel {
  stage(payload: Uint8Array, filename: string): Promise<StageResult>;
  takeStaged(): Promise<StagedRecord | null>;
  peekStaged(): Promise<StagedRecord | null>;
}

export function encodePayload(payload: Uint8Array): string {
  return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString(
    "base64",
  );
}

export function decodePayload(encoded: string): Buffer | null {
  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    return null;
  }
  return Buffer.from(encoded, "base64");
}

function storeFailure(action: string, error: unknown): JourneyHandoffError {
  return new JourneyHandoffError(
    "store_unavailable",
    `Could not ${action} the shared store: ${errorMessage(error)}`,
    { cause: error },
  );
}

export function createStagingChannel(options: StagingChannelOptions): StagingChannel {
  const { store, wake } = options;
  const wakeUri = options.wakeUri ?? DEFAULT_WAKE_URI;
  const log = options.log ?? consoleLogSink;

  async function readRecord(): Promise<StagedRecord | null> {
    let encoded: string | undefined;
    let filename: string | undefined;
    try {
      encoded = await store.get(PENDING_IMPORT_DATA_KEY);
      filename = await store.get(PENDING_IMPORT_FILENAME_KEY);
    } catch (error) {
      throw storeFailure("read from", error);
    }

    if (encoded === undefined) {
      return null;
    }

    const payload = decodePayload(encoded);
    if (!payload) {
      log({
        level: "warn",
        event: "staging.invalid_payload",
        encodedLength: encoded.length,
      });
      return null;
    }

    return { payload, filename: filename ?? DEFAULT_PENDING_FILENAME };
  }

  return {
    async stage(payload, filename) {
      try {
        await store.set(PENDING_IMPORT_DATA_KEY, encodePayload(payload));
        await store.set(PENDING_IMPORT_FILENAME_KEY, filename);
      } catch (error) {
        throw storeFailure("write to", error);
      }

      log({
        level: "info",
        event: "staging.staged",
        filename,
        bytes: payload.byteLength,
      });

      const result: StageResult = {
        stagedBytes: payload.byteLength,
        filename,
        wake: "skipped",
      };

      if (!wake) {
        return result;
      }

      try {
        await wake.send(wakeUri);
        result.wake = "delivered";
      } catch (error) {
        const failure = new JourneyHandoffError(
          "wake_failed",
          `Wake signal ${wake.description} failed: ${errorMessage(error)}`,
          { cause: error },
        );
        log({
          level: "warn",
          event: "staging.wake_failed",
          kind: failure.kind,
          message: failure.message,
        });
        result.wake = "failed";
        result.wakeError = failure.message;
      }

      return result;
    },

    async takeStaged() {
      const record = await readRecord();
      if (!record) {
        return null;
      }

      try {
        await store.remove(PENDING_IMPORT_DATA_KEY);
        await store.remove(PENDING_IMPORT_FILENAME_KEY);
      } catch (error) {
        throw storeFailure("clear", error);
      }

      return record;
    },

    peekStaged() {
      return readRecord();
    },
  };
}
