import { readBool, readInt, readOptionalString, readString } from "../config/env.js";

const DEFAULT_ENGINE_HOST = "127.0.0.1:8188";
const DEFAULT_CLIENT_ID = "render-worker-stable-client";
/** Readiness probing: 500 attempts spaced by 50 ms. */
const DEFAULT_PROBE_MAX_ATTEMPTS = 500;
const DEFAULT_PROBE_INTERVAL_MS = 50;
const DEFAULT_PROBE_TIMEOUT_MS = 5_000;
const DEFAULT_RECONNECT_ATTEMPTS = 5;
const DEFAULT_RECONNECT_DELAY_S = 3;
const DEFAULT_RECEIVE_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_STALLED_RECEIVES = 40;

/** Per-request timeouts (ms) applied to the engine HTTP surface. */
export interface EngineTimeouts {
  readonly submitMs: number;
  readonly historyMs: number;
  readonly imageMs: number;
  /** Video assets are larger and slower to serialise on the engine side. */
  readonly videoMs: number;
  readonly objectInfoMs: number;
  readonly systemStatsMs: number;
  readonly uploadMs: number;
}

export interface ProbeConfig {
  readonly maxAttempts: number;
  readonly intervalMs: number;
  readonly timeoutMs: number;
}

export interface EngineConfig {
  /** `host:port` of the engine, without scheme. */
  readonly host: string;
  /** Correlation token scoping the streaming connection. */
  readonly clientId: string;
  readonly probe: ProbeConfig;
  readonly timeouts: EngineTimeouts;
}

export interface StreamConfig {
  readonly reconnectAttempts: number;
  readonly reconnectDelaySeconds: number;
  readonly receiveTimeoutMs: number;
  /** Consecutive receive timeouts tolerated before a liveness probe. */
  readonly maxStalledReceives: number;
  readonly handshakeTimeoutMs: number;
  /** Logs every received frame at debug level. */
  readonly trace: boolean;
}

export interface StorageConfig {
  /** Presence selects upload over inline base64 persistence. */
  readonly endpoint: string | null;
  readonly authToken: string | null;
}

export interface WorkerConfig {
  readonly engine: EngineConfig;
  readonly stream: StreamConfig;
  readonly storage: StorageConfig;
  /** Asks the surrounding harness to restart the worker after each job. */
  readonly refreshAfterJob: boolean;
  readonly logFile: string | null;
}

/** Base URL of the engine HTTP surface. */
export function engineHttpUrl(config: EngineConfig): string {
  return `http://${config.host}`;
}

/** URL of the streaming endpoint scoped to the configured correlation token. */
export function engineStreamUrl(config: EngineConfig): string {
  const url = new URL("/ws", `ws://${config.host}`);
  url.searchParams.set("clientId", config.clientId);
  return url.toString();
}

/** Secrets that must never appear in log entries. */
export function collectRedactionTokens(config: WorkerConfig): string[] {
  const token = config.storage.authToken?.trim();
  return token ? [token] : [];
}

/**
 * Builds the worker configuration from the environment. This is the only
 * place reading `process.env`; every component receives its slice explicitly.
 */
export function loadWorkerConfig(): WorkerConfig {
  return {
    engine: {
      host: readString("ENGINE_HOST", DEFAULT_ENGINE_HOST),
      clientId: readString("ENGINE_CLIENT_ID", DEFAULT_CLIENT_ID),
      probe: {
        maxAttempts: readInt("ENGINE_PROBE_MAX_RETRIES", DEFAULT_PROBE_MAX_ATTEMPTS, { min: 1 }),
        intervalMs: readInt("ENGINE_PROBE_INTERVAL_MS", DEFAULT_PROBE_INTERVAL_MS, { min: 0 }),
        timeoutMs: readInt("ENGINE_PROBE_TIMEOUT_MS", DEFAULT_PROBE_TIMEOUT_MS, { min: 1 }),
      },
      timeouts: {
        submitMs: 30_000,
        historyMs: 30_000,
        imageMs: 60_000,
        videoMs: 120_000,
        objectInfoMs: 10_000,
        systemStatsMs: 5_000,
        uploadMs: 30_000,
      },
    },
    stream: {
      reconnectAttempts: readInt("WEBSOCKET_RECONNECT_ATTEMPTS", DEFAULT_RECONNECT_ATTEMPTS, { min: 0, max: 100 }),
      reconnectDelaySeconds: readInt("WEBSOCKET_RECONNECT_DELAY_S", DEFAULT_RECONNECT_DELAY_S, { min: 0, max: 600 }),
      receiveTimeoutMs: readInt("WEBSOCKET_RECEIVE_TIMEOUT_MS", DEFAULT_RECEIVE_TIMEOUT_MS, { min: 1 }),
      maxStalledReceives: readInt("WEBSOCKET_MAX_STALLED_RECEIVES", DEFAULT_MAX_STALLED_RECEIVES, { min: 1 }),
      handshakeTimeoutMs: 30_000,
      trace: readBool("WEBSOCKET_TRACE", false),
    },
    storage: {
      endpoint: readOptionalString("BUCKET_ENDPOINT_URL") ?? null,
      authToken: readOptionalString("BUCKET_AUTH_TOKEN") ?? null,
    },
    refreshAfterJob: readBool("REFRESH_WORKER", false),
    logFile: readOptionalString("LOG_FILE") ?? null,
  };
}
