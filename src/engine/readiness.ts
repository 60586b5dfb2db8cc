import { setTimeout as delay } from "node:timers/promises";

import type { StructuredLogger } from "../logger.js";
import { describeError } from "../worker/errors.js";
import { raceAbort } from "./deadline.js";

/** Outcome of a single liveness probe against the engine root URL. */
export interface EngineStatus {
  readonly reachable: boolean;
  readonly statusCode: number | null;
  readonly error: string | null;
}

export interface ProbeOptions {
  readonly timeoutMs: number;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Issues one `GET` against {@link url}. Only a `200` counts as reachable; every
 * failure is folded into the returned status instead of being thrown.
 */
export async function probeEngine(url: string, options: ProbeOptions): Promise<EngineStatus> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    const response = await raceAbort(fetchImpl(url, { method: "GET", signal: controller.signal }), controller.signal);
    await response.body?.cancel().catch(() => undefined);
    return { reachable: response.status === 200, statusCode: response.status, error: null };
  } catch (error) {
    const message = controller.signal.aborted ? `probe timed out after ${options.timeoutMs} ms` : describeError(error);
    return { reachable: false, statusCode: null, error: message };
  } finally {
    clearTimeout(timeout);
  }
}

export interface AwaitReadyOptions extends ProbeOptions {
  readonly maxAttempts: number;
  readonly intervalMs: number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: StructuredLogger | null;
}

/**
 * Polls {@link url} until it answers `200` or {@link AwaitReadyOptions.maxAttempts}
 * probes have failed. Exhaustion resolves to `false`; callers decide whether
 * that is fatal.
 */
export async function awaitEngineReady(url: string, options: AwaitReadyOptions): Promise<boolean> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const attempts = Math.max(1, options.maxAttempts);
  options.logger?.info("engine_probe_started", { url, max_attempts: attempts, interval_ms: options.intervalMs });

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    const status = await probeEngine(url, options);
    if (status.reachable) {
      options.logger?.info("engine_reachable", { url, attempt });
      return true;
    }
    options.logger?.debug("engine_probe_failed", {
      url,
      attempt,
      max_attempts: attempts,
      status_code: status.statusCode,
      error: status.error,
    });
    if (attempt < attempts) {
      await sleep(options.intervalMs);
    }
  }

  options.logger?.error("engine_probe_exhausted", { url, attempts });
  return false;
}
