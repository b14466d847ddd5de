export * from "./core/errors.js";
export * from "./core/log.js";

export * from "./format/types.js";
export * from "./format/magicHeaders.js";
export * from "./format/journeySchema.js";
export * from "./format/decoder.js";
export * from "./format/summary.js";
export * from "./format/envelope.js";
export * from "./format/journeyWriter.js";

export * from "./staging/keys.js";
export * from "./staging/sharedStore.js";
export * from "./staging/fileSharedStore.js";
export * from "./staging/gcsSharedStore.js";
export * from "./staging/wakeSignal.js";
export * from "./staging/stagingChannel.js";

export * from "./consumer/importConsumer.js";
export * from "./consumer/wakeListener.js";

export * from "./host/messages.js";
export * from "./host/shareEntryPoint.js";
export * from "./host/previewEntryPoint.js";
