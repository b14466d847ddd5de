import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import {
  JourneyHandoffError,
  type JourneyHandoffErrorKind,
  errorMessage,
} from "../core/errors.js";
import { JOURNEY_FILE_EXTENSION } from "../format/journeyWriter.js";
import type { StagingChannel, WakeStatus } from "../staging/stagingChannel.js";
import {
  FAILURE_TITLE,
  SUCCESS_MESSAGE,
  SUCCESS_TITLE,
  describeFailure,
} from "./messages.js";

export type HandoffOutcome =
  | {
      ok: true;
      title: string;
      message: string;
      filename: string;
      stagedBytes: number;
      wake: WakeStatus;
    }
  | {
      ok: false;
      kind: JourneyHandoffErrorKind;
      title: string;
      message: string;
      detail: string;
    };

export interface HandoffRequest {
  path: string;
  channel: StagingChannel;
}

export function hasJourneyExtension(filename: string): boolean {
  return extname(filename).toLowerCase() === JOURNEY_FILE_EXTENSION;
}

function failed(error: JourneyHandoffError): HandoffOutcome {
  return {
    ok: false,
    kind: error.kind,
    title: FAILURE_TITLE,
    message: describeFailure(error.kind),
    detail: error.message,
  };
}

export async function stageFile(request: HandoffRequest): Promise<HandoffOutcome> {
  const filename = basename(request.path);

  let bytes: Buffer;
  try {
    bytes = await readFile(request.path);
  } catch (error) {
    return failed(
      new JourneyHandoffError(
        "unreadable_input",
        `Failed to read ${request.path}: ${errorMessage(error)}`,
        { cause: error },
      ),
    );
  }

  try {
    const result = await request.channel.stage(bytes, filename);
    return {
      ok: true,
      title: SUCCESS_TITLE,
      message: SUCCESS_MESSAGE,
      filename,
      stagedBytes: result.stagedBytes,
      wake: result.wake,
    };
  } catch (error) {
    if (error instanceof JourneyHandoffError) {
      return failed(error);
    }
    throw error;
  }
}

export async function handleSharedFile(request: HandoffRequest): Promise<HandoffOutcome> {
  const filename = basename(request.path);
  if (!hasJourneyExtension(filename)) {
    return failed(
      new JourneyHandoffError(
        "unsupported_extension",
        `Refusing ${filename}: only ${JOURNEY_FILE_EXTENSION} files are accepted`,
      ),
    );
  }

  return stageFile(request);
}
