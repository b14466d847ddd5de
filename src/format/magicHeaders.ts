export const MAGIC_HEADER_FILE = "MAPPED_JOURNEY_FILE\n" as const;
export const MAGIC_HEADER_V1 = "MAPPED_JOURNEY_V1\n" as const;

export type MagicHeader = typeof MAGIC_HEADER_FILE | typeof MAGIC_HEADER_V1;

// Checked in this order; no header is a prefix of another.
export const MAGIC_HEADERS: readonly MagicHeader[] = [
  MAGIC_HEADER_FILE,
  MAGIC_HEADER_V1,
];

const HEADER_BYTES = MAGIC_HEADERS.map((header) => ({
  header,
  bytes: Buffer.from(header, "utf-8"),
}));

export interface StrippedPayload {
  payload: Buffer;
  header?: MagicHeader;
}

function startsWith(bytes: Uint8Array, prefix: Buffer): boolean {
  if (bytes.byteLength < prefix.byteLength) {
    return false;
  }

  for (let i = 0; i < prefix.byteLength; i += 1) {
    if (bytes[i] !== prefix[i]) {
      return false;
    }
  }
  return true;
}

export function stripMagicHeader(bytes: Uint8Array): StrippedPayload {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  for (const entry of HEADER_BYTES) {
    if (startsWith(buffer, entry.bytes)) {
      return {
        payload: buffer.subarray(entry.bytes.byteLength),
        header: entry.header,
      };
    }
  }

  return { payload: buffer };
}
