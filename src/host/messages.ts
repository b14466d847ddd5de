import type { JourneyHandoffErrorKind } from "../core/errors.js";

export const FAILURE_TITLE = "Cannot Import";
export const SUCCESS_TITLE = "Opening Mapped";
export const SUCCESS_MESSAGE = "Your friend's journey is being imported!";

const FAILURE_MESSAGES: Record<JourneyHandoffErrorKind, string> = {
  unreadable_input: "Could not read file",
  not_a_journey_file: "Not a valid Mapped journey file",
  store_unavailable: "Could not access app storage",
  wake_failed: "Saved, but Mapped could not be opened. Open Mapped to finish importing.",
  unsupported_extension: "Please select a .mapped file",
};

export function describeFailure(kind: JourneyHandoffErrorKind): string {
  return FAILURE_MESSAGES[kind];
}
