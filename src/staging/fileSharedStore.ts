import { randomUUID } from "node:crypto";
import { constants } from "node:fs";
import { access, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { JourneyHandoffError, errorMessage } from "../core/errors.js";
import { assertSafeSharingGroup, sharedObjectKey } from "./keys.js";
import type { SharedKeyValueStore, SharedStoreDescription } from "./sharedStore.js";

export interface FileSharedStoreOptions {
  rootDir: string;
  sharingGroup: string;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class FileSharedStore implements SharedKeyValueStore {
  readonly description: SharedStoreDescription;
  private readonly rootDir: string;
  private readonly sharingGroup: string;

  constructor(options: FileSharedStoreOptions) {
    this.rootDir = options.rootDir;
    this.sharingGroup = options.sharingGroup;
    this.description = {
      kind: "filesystem",
      dir: options.rootDir,
      sharingGroup: options.sharingGroup,
    };
  }

  private pathFor(key: string): string {
    return join(this.rootDir, sharedObjectKey(this.sharingGroup, key));
  }

  async get(key: string): Promise<string | undefined> {
    try {
      return await readFile(this.pathFor(key), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async set(key: string, value: string): Promise<void> {
    const absolutePath = this.pathFor(key);
    await mkdir(dirname(absolutePath), { recursive: true });

    const tempPath = `${absolutePath}.tmp-${randomUUID()}`;
    await writeFile(tempPath, value, "utf-8");
    await rename(tempPath, absolutePath);
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}

export async function openFileSharedStore(
  options: FileSharedStoreOptions,
): Promise<FileSharedStore> {
  assertSafeSharingGroup(options.sharingGroup);
  const store = new FileSharedStore(options);
  const groupDir = join(options.rootDir, options.sharingGroup);

  try {
    await mkdir(groupDir, { recursive: true });
    await access(groupDir, constants.R_OK | constants.W_OK);
  } catch (error) {
    throw new JourneyHandoffError(
      "store_unavailable",
      `Shared store at ${groupDir} is not available: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return store;
}
