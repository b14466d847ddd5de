import { isRecord } from "./journeySchema.js";

// Some mail and chat clients only pass through `.json` attachments, so a
// journey may arrive as `{"_mapped_file": true, "_data": <journey>}`.
export const ENVELOPE_MARKER = "_mapped_file";
export const ENVELOPE_DATA = "_data";

export function unwrapJsonEnvelope(payload: Buffer): Buffer {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString("utf-8"));
  } catch {
    // Not JSON at all; the journey decoder reports it.
    return payload;
  }

  if (!isRecord(parsed) || parsed[ENVELOPE_MARKER] !== true) {
    return payload;
  }

  if (!(ENVELOPE_DATA in parsed)) {
    return payload;
  }
  return Buffer.from(JSON.stringify(parsed[ENVELOPE_DATA]), "utf-8");
}
