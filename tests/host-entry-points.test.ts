import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { MAGIC_HEADER_V1 } from "../src/format/magicHeaders.js";
import { describeFailure } from "../src/host/messages.js";
import { openFromPreview, preparePreview } from "../src/host/previewEntryPoint.js";
import { handleSharedFile, hasJourneyExtension } from "../src/host/shareEntryPoint.js";
import { openFileSharedStore } from "../src/staging/fileSharedStore.js";
import { DEFAULT_SHARING_GROUP } from "../src/staging/keys.js";
import type { SharedKeyValueStore } from "../src/staging/sharedStore.js";
import { type StagingChannel, createStagingChannel } from "../src/staging/stagingChannel.js";
import { ALEX_JOURNEY, EMPTY_LEGACY_JOURNEY, jsonBytes } from "./fixtures/journeys.js";

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const path = tempDirs.pop();
    if (!path) {
      continue;
    }
    await rm(path, { recursive: true, force: true });
  }
});

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "journey-handoff-host-"));
  tempDirs.push(dir);
  return dir;
}

async function openTempChannel(): Promise<StagingChannel> {
  const rootDir = await makeTempDir();
  const store = await openFileSharedStore({ rootDir, sharingGroup: DEFAULT_SHARING_GROUP });
  return createStagingChannel({ store, log: () => {} });
}

const readOnlyStore: SharedKeyValueStore = {
  description: { kind: "filesystem", dir: "/read-only", sharingGroup: DEFAULT_SHARING_GROUP },
  get: async () => undefined,
  set: async () => {
    throw new Error("EROFS: read-only file system");
  },
  remove: async () => {},
};

describe("share entry point", () => {
  it("stages .mapped files with a success message", async () => {
    const dir = await makeTempDir();
    const path = join(dir, "Alex_Journey.MAPPED");
    const bytes = jsonBytes(ALEX_JOURNEY, MAGIC_HEADER_V1);
    await writeFile(path, bytes);
    const channel = await openTempChannel();

    const outcome = await handleSharedFile({ path, channel });

    expect(outcome).toStrictEqual({
      ok: true,
      title: "Opening Mapped",
      message: "Your friend's journey is being imported!",
      filename: "Alex_Journey.MAPPED",
      stagedBytes: bytes.byteLength,
      wake: "skipped",
    });
    expect((await channel.takeStaged())?.payload.equals(bytes)).toBe(true);
  });

  it("refuses other extensions without staging", async () => {
    const dir = await makeTempDir();
    const path = join(dir, "journey.json");
    await writeFile(path, jsonBytes(ALEX_JOURNEY));
    const channel = await openTempChannel();

    const outcome = await handleSharedFile({ path, channel });

    expect(outcome).toMatchObject({
      ok: false,
      kind: "unsupported_extension",
      title: "Cannot Import",
      message: "Please select a .mapped file",
    });
    expect(await channel.takeStaged()).toBeNull();
  });

  it("does not validate content before staging", async () => {
    const dir = await makeTempDir();
    const path = join(dir, "garbage.mapped");
    await writeFile(path, Buffer.from("not json at all", "utf-8"));
    const channel = await openTempChannel();

    const outcome = await handleSharedFile({ path, channel });

    expect(outcome.ok).toBe(true);
    expect((await channel.takeStaged())?.payload.toString("utf-8")).toBe("not json at all");
  });

  it("reports unreadable files and unavailable storage in user terms", async () => {
    const dir = await makeTempDir();
    const channel = await openTempChannel();

    const unreadable = await handleSharedFile({ path: join(dir, "gone.mapped"), channel });
    expect(unreadable).toMatchObject({
      ok: false,
      kind: "unreadable_input",
      message: "Could not read file",
    });

    const path = join(dir, "trip.mapped");
    await writeFile(path, jsonBytes(EMPTY_LEGACY_JOURNEY));
    const blocked = await handleSharedFile({
      path,
      channel: createStagingChannel({ store: readOnlyStore, log: () => {} }),
    });
    expect(blocked).toStrictEqual({
      ok: false,
      kind: "store_unavailable",
      title: "Cannot Import",
      message: "Could not access app storage",
      detail: "Could not write to the shared store: EROFS: read-only file system",
    });
  });

  it("matches the extension case-insensitively", () => {
    expect(hasJourneyExtension("a.mapped")).toBe(true);
    expect(hasJourneyExtension("a.MaPpEd")).toBe(true);
    expect(hasJourneyExtension("a.mapped.json")).toBe(false);
    expect(hasJourneyExtension(".mapped")).toBe(false);
  });
});

describe("preview entry point", () => {
  it("builds a preview for a shareable journey", async () => {
    const dir = await makeTempDir();
    const path = join(dir, "Alex_Journey.mapped");
    await writeFile(path, jsonBytes(ALEX_JOURNEY, MAGIC_HEADER_V1));

    const outcome = await preparePreview({ path, locale: "en-US", timeZone: "UTC" });

    expect(outcome).toStrictEqual({
      ok: true,
      preview: {
        senderName: "Alex",
        tagline: "wants to share their journey",
        locationsText: "3 locations",
        dateRangeText: "Jun 1, 2025 - Jun 3, 2025",
        callToAction: "Tap 'Open in Mapped' below to add",
      },
    });
  });

  it("accepts any file name and leaves the range empty when absent", async () => {
    const dir = await makeTempDir();
    const path = join(dir, "export.txt");
    await writeFile(path, jsonBytes(EMPTY_LEGACY_JOURNEY));

    const outcome = await preparePreview({ path, locale: "en-US", timeZone: "UTC" });

    expect(outcome).toMatchObject({
      ok: true,
      preview: { senderName: "Friend", locationsText: "0 locations", dateRangeText: "" },
    });
  });

  it("rejects files that are not journeys", async () => {
    const dir = await makeTempDir();
    const path = join(dir, "other.mapped");
    await writeFile(path, Buffer.from('{"foo": 1}', "utf-8"));

    const outcome = await preparePreview({ path });

    expect(outcome).toMatchObject({
      ok: false,
      kind: "not_a_journey_file",
      title: "Cannot Import",
      message: "Not a valid Mapped journey file",
    });
  });

  it("stages the previewed file without an extension check", async () => {
    const dir = await makeTempDir();
    const path = join(dir, "shared-from-chat.json");
    const bytes = jsonBytes(ALEX_JOURNEY);
    await writeFile(path, bytes);
    const channel = await openTempChannel();

    const outcome = await openFromPreview({ path, channel });

    expect(outcome).toMatchObject({ ok: true, filename: "shared-from-chat.json" });
    expect((await channel.takeStaged())?.filename).toBe("shared-from-chat.json");
  });
});

describe("failure messages", () => {
  it("never surfaces internal codes", () => {
    const kinds = [
      "unreadable_input",
      "not_a_journey_file",
      "store_unavailable",
      "wake_failed",
      "unsupported_extension",
    ] as const;

    for (const kind of kinds) {
      const message = describeFailure(kind);
      expect(message.length).toBeGreaterThan(0);
      expect(message).not.toContain(kind);
    }
  });
});
