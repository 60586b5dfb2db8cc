import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder inserted wherever a secret was scrubbed. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are replaced by {@link REDACTION_TOKEN} when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "auth_token",
  "access_token",
  "cookie",
  "set-cookie",
]);

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

/**
 * Parses the `LOG_REDACT` directive list. Entries such as `on`/`off` toggle
 * key-based redaction, every other entry is a literal that gets scrubbed from
 * string values. Providing literals without a toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): { enabled: boolean; tokens: string[] } {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of raw.split(",").map((value) => value.trim())) {
    if (directive.length === 0) {
      continue;
    }
    const lower = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(lower)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(lower)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** File mirroring every entry. `null` keeps the logger on stdout only. */
  readonly logFile?: string | null;
  readonly maxFileSizeBytes?: number;
  /** Number of files kept during rotation, the active one included. */
  readonly maxFileCount?: number;
  /** Literal secrets scrubbed from string values (bucket tokens, ...). */
  readonly redactSecrets?: readonly string[];
  /** Overrides the toggle derived from `LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Invoked with a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting one JSON document per line on stdout. When a log
 * file is configured the same lines are appended sequentially and the file is
 * rotated once it would grow past {@link LoggerOptions.maxFileSizeBytes}.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: string[];
  private readonly redactionEnabled: boolean;
  private readonly entryListener: ((entry: LogEntry) => void) | null;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.LOG_REDACT);
    const secrets = new Set<string>(directives.tokens);
    for (const secret of options.redactSecrets ?? []) {
      if (secret.trim().length > 0) {
        secrets.add(secret);
      }
    }
    this.redactSecrets = [...secrets];
    this.redactionEnabled = options.redactionEnabled ?? (directives.enabled || secrets.size > 0);
    this.entryListener = options.onEntry ?? null;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Resolves once every queued file write has been flushed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload: this.redact(payload) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);
    this.entryListener?.(structuredClone(entry));

    const target = this.logFile;
    if (!target) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDirectory(target);
          await this.rotateIfNeeded(target, Buffer.byteLength(line, "utf8"));
          await appendFile(target, line, "utf8");
        } catch (error) {
          this.logDirectoryReady = false;
          writeInternalError("log_file_write_failed", error);
        }
      })
      .catch((error: unknown) => {
        writeInternalError("log_queue_failed", error);
        this.writeQueue = Promise.resolve();
      });
  }

  private async ensureLogDirectory(target: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(target), { recursive: true });
    this.logDirectoryReady = true;
  }

  private async rotateIfNeeded(target: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(target)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(target, { force: true });
      return;
    }
    await rm(`${target}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${target}.${index}`, `${target}.${index + 1}`);
    }
    await renameIfPresent(target, `${target}.1`);
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      let sanitised = value;
      for (const secret of this.redactSecrets) {
        sanitised = sanitised.split(secret).join(REDACTION_TOKEN);
      }
      return sanitised;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

function writeInternalError(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
