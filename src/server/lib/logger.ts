/**
 * Per-request structured logger for the Cadence API.
 *
 * Entries are buffered for the lifetime of a request and shipped as one batch
 * to the New Relic Log API through the caller's `waitUntil()`. Without a
 * license key they go to the console instead.
 *
 * Credentials never reach either sink: attribute keys that name a password,
 * token or authorization header are replaced with `[REDACTED]` at the moment
 * they are logged, at any depth of nesting.
 */

export type LogLevel = "INFO" | "WARN" | "ERROR";

export type LogAttributes = Record<string, unknown>;

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  attributes: LogAttributes;
}

export interface LoggerOptions {
  /** "production", "development", ... Sent as a common attribute. */
  environment: string;
  /** Merged into every entry, e.g. the request id. Per-call attributes win. */
  attributes?: LogAttributes;
}

export type WaitUntil = (promise: Promise<unknown>) => void;

export const REDACTED = "[REDACTED]";

const NR_LOG_API_ENDPOINT = "https://log-api.newrelic.com/log/v1";

// Compared after lower-casing and folding "-" to "_"
const SECRET_KEYS = new Set([
  "password",
  "current_password",
  "new_password",
  "password_hash",
  "passwordhash",
  "access_token",
  "refresh_token",
  "token",
  "authorization",
  "cookie",
  "api_key",
]);

const MAX_DEPTH = 6;

function isSecretKey(key: string): boolean {
  return SECRET_KEYS.has(key.toLowerCase().replaceAll("-", "_"));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function redactValue(value: unknown, depth: number): unknown {
  if (depth >= MAX_DEPTH) return value;
  if (Array.isArray(value)) return value.map((item) => redactValue(item, depth + 1));
  if (isPlainObject(value)) return redactAttributes(value, depth + 1);
  return value;
}

/** Copy `attributes` with every credential-bearing key masked. */
export function redactAttributes(attributes: LogAttributes, depth = 0): LogAttributes {
  const out: LogAttributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    out[key] = isSecretKey(key) ? REDACTED : redactValue(value, depth);
  }
  return out;
}

const consoleSink: Record<LogLevel, (line: string, attributes: LogAttributes) => void> = {
  INFO: (line, attributes) => console.log(line, attributes),
  WARN: (line, attributes) => console.warn(line, attributes),
  ERROR: (line, attributes) => console.error(line, attributes),
};

export class Logger {
  private readonly buffer: LogEntry[];
  private readonly environment: string;
  private readonly baseAttributes: LogAttributes;

  constructor(options: LoggerOptions, buffer: LogEntry[] = []) {
    this.environment = options.environment;
    this.baseAttributes = redactAttributes(options.attributes ?? {});
    this.buffer = buffer;
  }

  info(message: string, attributes: LogAttributes = {}): void {
    this.append("INFO", message, attributes);
  }

  warn(message: string, attributes: LogAttributes = {}): void {
    this.append("WARN", message, attributes);
  }

  error(message: string, attributes: LogAttributes = {}): void {
    this.append("ERROR", message, attributes);
  }

  /**
   * A logger that adds `attributes` to everything it writes and shares this
   * logger's buffer, so one flush ships both.
   */
  child(attributes: LogAttributes): Logger {
    return new Logger(
      {
        environment: this.environment,
        attributes: { ...this.baseAttributes, ...attributes },
      },
      this.buffer,
    );
  }

  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Ship and empty the buffer. With a license key the batch is posted to New
   * Relic through `waitUntil()`; without one it is written to the console
   * synchronously.
   */
  flush(waitUntil: WaitUntil, licenseKey?: string): void {
    if (this.buffer.length === 0) return;

    // Emptied in place: children hold the same array
    const entries = this.buffer.splice(0, this.buffer.length);

    if (!licenseKey) {
      for (const entry of entries) {
        consoleSink[entry.level](`[${entry.level}] ${entry.message}`, entry.attributes);
      }
      return;
    }

    const payload = [
      {
        common: {
          attributes: {
            logtype: "hono-api",
            service: "cadence-api",
            environment: this.environment,
          },
        },
        logs: entries,
      },
    ];

    waitUntil(
      fetch(NR_LOG_API_ENDPOINT, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Api-Key": licenseKey,
        },
        body: JSON.stringify(payload),
      }).catch((err: unknown) => {
        console.error("[logger] Failed to ship logs to New Relic:", err);
      }),
    );
  }

  private append(level: LogLevel, message: string, attributes: LogAttributes): void {
    this.buffer.push({
      timestamp: Date.now(),
      level,
      message,
      attributes: { ...this.baseAttributes, ...redactAttributes(attributes) },
    });
  }
}
