import { spawn } from "node:child_process";

/**
 * Nudges the consuming process to look at the shared store. Carries no
 * payload; delivery is best effort and callers never depend on it.
 */
export interface WakeSignal {
  readonly description: string;
  send(uri: string): Promise<void>;
}

export interface HttpWakeSignalOptions {
  url: string;
  timeoutMs?: number;
}

function normalizeBaseUrl(raw: string): string {
  return raw.replace(/\/+$/, "");
}

export function createHttpWakeSignal(options: HttpWakeSignalOptions): WakeSignal {
  const endpoint = `${normalizeBaseUrl(options.url)}/v1/wake`;
  const timeoutMs = options.timeoutMs ?? 2_000;

  return {
    description: `http:${endpoint}`,
    async send(uri) {
      const response = await fetch(endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ uri }),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new Error(`Wake endpoint answered ${response.status}: ${text.trim()}`);
      }
    },
  };
}

export interface CommandWakeSignalOptions {
  command: string;
}

export function createCommandWakeSignal(options: CommandWakeSignalOptions): WakeSignal {
  return {
    description: `command:${options.command}`,
    send(uri) {
      return new Promise<void>((resolve, reject) => {
        const child = spawn(options.command, [uri], { stdio: "ignore" });
        child.on("error", reject);
        child.on("exit", (code, signal) => {
          if (code === 0) {
            resolve();
            return;
          }
          reject(
            new Error(
              `${options.command} exited with ${code === null ? `signal ${signal}` : `code ${code}`}`,
            ),
          );
        });
      });
    },
  };
}
