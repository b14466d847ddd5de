import { createServer } from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { isRecord } from "../format/journeySchema.js";
import { DEFAULT_WAKE_URI } from "../staging/keys.js";
import type { ImportConsumer } from "./importConsumer.js";

export interface WakeListenerOptions {
  consumer: ImportConsumer;
  wakeUri?: string;
  maxBodyBytes?: number;
}

class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.statusCode = statusCode;
  }
}

function json(response: ServerResponse, status: number, body: unknown): void {
  const payload = `${JSON.stringify(body)}\n`;
  response.statusCode = status;
  response.setHeader("content-type", "application/json");
  response.end(payload);
}

async function readJsonBody(
  request: IncomingMessage,
  maxBodyBytes: number,
): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buffer.byteLength;

    if (total > maxBodyBytes) {
      throw new HttpError(413, "Payload too large");
    }

    chunks.push(buffer);
  }

  try {
    return JSON.parse(Buffer.concat(chunks).toString("utf-8"));
  } catch {
    throw new HttpError(400, "Body must be JSON");
  }
}

export function createWakeListenerServer(options: WakeListenerOptions) {
  const wakeUri = options.wakeUri ?? DEFAULT_WAKE_URI;
  const maxBodyBytes = options.maxBodyBytes ?? 4 * 1024;

  return createServer(async (request, response) => {
    try {
      const url = new URL(request.url ?? "/", "http://localhost");

      if (request.method === "GET" && url.pathname === "/healthz") {
        json(response, 200, { ok: true });
        return;
      }

      if (request.method !== "POST" || url.pathname !== "/v1/wake") {
        json(response, 404, { error: "not_found" });
        return;
      }

      const body = await readJsonBody(request, maxBodyBytes);
      const uri = isRecord(body) ? body.uri : undefined;
      if (uri !== wakeUri) {
        json(response, 400, {
          error: "invalid_request",
          message: `Expected uri ${wakeUri}`,
        });
        return;
      }

      const outcome = await options.consumer.consumePending();
      json(response, 200, outcome);
    } catch (error) {
      const statusCode = error instanceof HttpError ? error.statusCode : 500;
      json(response, statusCode, {
        error: statusCode === 500 ? "internal_error" : "invalid_request",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });
}
