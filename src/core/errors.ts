export type JourneyHandoffErrorKind =
  | "unreadable_input"
  | "not_a_journey_file"
  | "store_unavailable"
  | "wake_failed"
  | "unsupported_extension";

export class JourneyHandoffError extends Error {
  readonly kind: JourneyHandoffErrorKind;

  constructor(
    kind: JourneyHandoffErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "JourneyHandoffError";
    this.kind = kind;
  }
}

export type Result<T, E = JourneyHandoffError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
