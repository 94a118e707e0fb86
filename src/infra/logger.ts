import {
  emitOTelLog,
  getOTelConfig,
  initOTelProvider,
  isOTelEnabled,
  type OTelAttributes,
  type OTelHandle,
} from "./otel.ts";
import { config } from "./config.ts";

type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SESSION_TOKEN_PATTERNS = [
  /bearer\s+[A-Za-z0-9\-_.]+/gi,
  /[A-Za-z0-9\-_]{30,}/g,
];

const SENSITIVE_FIELDS = new Set([
  "password",
  "sid",
  "session_id",
  "token",
  "secret",
  "auth",
  "authorization",
  "cookie",
]);

export class DataSanitizer {
  static sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
      return data;
    }
    if (typeof data === "string") {
      return this.sanitizeString(data);
    }
    if (Array.isArray(data)) {
      return data.map((item) => this.sanitize(item));
    }
    if (typeof data === "object") {
      return this.sanitizeRecord(data);
    }
    return data;
  }

  static sanitizeString(str: string): string {
    let sanitized = str;
    for (const pattern of SESSION_TOKEN_PATTERNS) {
      sanitized = sanitized.replace(pattern, (match) => {
        if (match.length <= 8) {
          return "[REDACTED]";
        }
        return (
          match.substring(0, 4) +
          "[REDACTED]" +
          match.substring(match.length - 4)
        );
      });
    }
    return sanitized;
  }

  static sanitizeRecord(obj: object): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
        sanitized[key] = "[REDACTED]";
      } else {
        sanitized[key] = this.sanitize(value);
      }
    }
    return sanitized;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function configuredLevel(): LogLevel {
  const level = config.loadConfig().logger.level;
  return isLogLevel(level) ? level : "info";
}

let otelHandle: OTelHandle | null = null;

export class StructuredLogger {
  private readonly component: string;
  private readonly serviceName: string;
  private readonly serviceVersion: string;
  private readonly deploymentEnv: string;

  constructor(component: string) {
    this.component = component;
    const service = getOTelConfig();
    this.serviceName = service.serviceName;
    this.serviceVersion = service.serviceVersion;
    this.deploymentEnv = service.environment;

    if (!otelHandle) {
      otelHandle = initOTelProvider();
    }
  }

  private format(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): Record<string, unknown> {
    return {
      timestamp: new Date().toISOString(),
      level,
      msg: DataSanitizer.sanitizeString(message),
      logger: this.component,
      "service.name": this.serviceName,
      "service.version": this.serviceVersion,
      "deployment.environment": this.deploymentEnv,
      ...(data ? DataSanitizer.sanitizeRecord(data) : {}),
    };
  }

  private emitToOTel(
    level: LogLevel,
    entry: Record<string, unknown>,
  ): void {
    if (!isOTelEnabled()) return;

    const attributes: OTelAttributes = {
      component: this.component,
    };
    for (const [key, value] of Object.entries(entry)) {
      if (
        key !== "msg" && key !== "timestamp" &&
        (typeof value === "string" || typeof value === "number" ||
          typeof value === "boolean")
      ) {
        attributes[key] = value;
      }
    }

    emitOTelLog(level, String(entry["msg"]), attributes);
  }

  private output(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[configuredLevel()]) {
      return;
    }

    const entry = this.format(level, message, data);
    const line = JSON.stringify(entry);
    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }
    this.emitToOTel(level, entry);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.output("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.output("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.output("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.output("error", message, data);
  }
}

export async function shutdownOTel(): Promise<void> {
  if (otelHandle) {
    const handle = otelHandle;
    otelHandle = null;
    await handle.shutdown();
  }
}

export function createComponentLogger(component: string): StructuredLogger {
  return new StructuredLogger(component);
}

export const logger = createComponentLogger("ttrss-feed-client");

export type { LogLevel };
