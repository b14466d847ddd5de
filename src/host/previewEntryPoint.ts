import type { JourneyHandoffErrorKind } from "../core/errors.js";
import { readJourneySummary } from "../format/decoder.js";
import type { SummaryFormatOptions } from "../format/types.js";
import { FAILURE_TITLE, describeFailure } from "./messages.js";
import { type HandoffOutcome, type HandoffRequest, stageFile } from "./shareEntryPoint.js";

export const PREVIEW_TAGLINE = "wants to share their journey";
export const PREVIEW_CALL_TO_ACTION = "Tap 'Open in Mapped' below to add";

export interface PreviewModel {
  senderName: string;
  tagline: string;
  locationsText: string;
  dateRangeText: string;
  callToAction: string;
}

export type PreviewOutcome =
  | { ok: true; preview: PreviewModel }
  | {
      ok: false;
      kind: JourneyHandoffErrorKind;
      title: string;
      message: string;
      detail: string;
    };

export interface PreviewRequest extends SummaryFormatOptions {
  path: string;
}

export async function preparePreview(request: PreviewRequest): Promise<PreviewOutcome> {
  const summary = await readJourneySummary(request.path, {
    locale: request.locale,
    timeZone: request.timeZone,
  });

  if (!summary.ok) {
    return {
      ok: false,
      kind: summary.error.kind,
      title: FAILURE_TITLE,
      message: describeFailure(summary.error.kind),
      detail: summary.error.message,
    };
  }

  const { senderName, locationCount, dateRangeText } = summary.value;
  return {
    ok: true,
    preview: {
      senderName,
      tagline: PREVIEW_TAGLINE,
      locationsText: `${locationCount} locations`,
      dateRangeText: dateRangeText ?? "",
      callToAction: PREVIEW_CALL_TO_ACTION,
    },
  };
}

// The preview already decoded the file, so no extension check here.
export function openFromPreview(request: HandoffRequest): Promise<HandoffOutcome> {
  return stageFile(request);
}
