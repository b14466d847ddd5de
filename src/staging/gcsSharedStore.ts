import { type Bucket, Storage } from "@google-cloud/storage";
import { JourneyHandoffError, errorMessage } from "../core/errors.js";
import { assertSafeSharingGroup, sharedObjectKey } from "./keys.js";
import type { SharedKeyValueStore, SharedStoreDescription } from "./sharedStore.js";

export interface GcsSharedStoreOptions {
  bucket: string;
  prefix?: string;
  sharingGroup: string;
  storage?: Storage;
}

function normalizePrefix(prefix: string | undefined): string {
  if (!prefix) {
    return "";
  }

  const trimmed = prefix.trim();
  if (!trimmed) {
    return "";
  }

  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
}

function isNotFound(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  if ("code" in error && error.code === 404) {
    return true;
  }

  return "statusCode" in error && error.statusCode === 404;
}

export class GcsSharedStore implements SharedKeyValueStore {
  readonly description: SharedStoreDescription;
  readonly bucket: Bucket;
  private readonly prefix: string;
  private readonly sharingGroup: string;

  constructor(options: GcsSharedStoreOptions) {
    this.prefix = normalizePrefix(options.prefix);
    this.sharingGroup = options.sharingGroup;
    this.bucket = (options.storage ?? new Storage()).bucket(options.bucket);
    this.description = {
      kind: "gcs",
      bucket: options.bucket,
      prefix: this.prefix,
      sharingGroup: options.sharingGroup,
    };
  }

  private objectName(key: string): string {
    return `${this.prefix}${sharedObjectKey(this.sharingGroup, key)}`;
  }

  async get(key: string): Promise<string | undefined> {
    try {
      const [contents] = await this.bucket.file(this.objectName(key)).download();
      return contents.toString("utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async set(key: string, value: string): Promise<void> {
    await this.bucket.file(this.objectName(key)).save(value, {
      contentType: "text/plain; charset=utf-8",
      resumable: false,
    });
  }

  async remove(key: string): Promise<void> {
    await this.bucket.file(this.objectName(key)).delete({ ignoreNotFound: true });
  }
}

export async function openGcsSharedStore(
  options: GcsSharedStoreOptions,
): Promise<GcsSharedStore> {
  assertSafeSharingGroup(options.sharingGroup);
  const store = new GcsSharedStore(options);

  let exists: boolean;
  try {
    [exists] = await store.bucket.exists();
  } catch (error) {
    throw new JourneyHandoffError(
      "store_unavailable",
      `Bucket ${options.bucket} is not reachable: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!exists) {
    throw new JourneyHandoffError(
      "store_unavailable",
      `Bucket ${options.bucket} does not exist.`,
    );
  }
  return store;
}
