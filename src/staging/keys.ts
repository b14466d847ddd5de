import { JourneyHandoffError } from "../core/errors.js";

export const DEFAULT_SHARING_GROUP = "group.mapped.journeys";

export const PENDING_IMPORT_DATA_KEY = "pendingImportData";
export const PENDING_IMPORT_FILENAME_KEY = "pendingImportFilename";
export const DEFAULT_PENDING_FILENAME = "import.mapped";

export const DEFAULT_WAKE_URI = "mapped://import";

const SHARING_GROUP_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;
const STORE_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

export function assertSafeSharingGroup(sharingGroup: string): void {
  if (!SHARING_GROUP_PATTERN.test(sharingGroup) || sharingGroup.includes("..")) {
    throw new JourneyHandoffError(
      "store_unavailable",
      `Invalid sharing group '${sharingGroup}'. Expected ${SHARING_GROUP_PATTERN.toString()}.`,
    );
  }
}

export function assertSafeStoreKey(key: string): void {
  if (!STORE_KEY_PATTERN.test(key)) {
    throw new Error(`Invalid store key '${key}'. Expected ${STORE_KEY_PATTERN.toString()}.`);
  }
}

export function sharedObjectKey(sharingGroup: string, key: string): string {
  assertSafeSharingGroup(sharingGroup);
  assertSafeStoreKey(key);

  return `${sharingGroup}/${key}`;
}
