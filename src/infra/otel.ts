/**
 * Optional OTLP export of client log records.
 *
 * Disabled unless OTEL_ENABLED=true. StructuredLogger forwards every record
 * that passes its level filter, after redaction, to the active exporter.
 */

import { logs, SeverityNumber, type Logger } from "@opentelemetry/api-logs";
import {
  BatchLogRecordProcessor,
  LoggerProvider,
  type LogRecordExporter,
} from "@opentelemetry/sdk-logs";
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";

const ATTR_DEPLOYMENT_ENVIRONMENT = "deployment.environment";
const OTLP_LOGS_PATH = "/v1/logs";

export interface OTelConfig {
  serviceName: string;
  serviceVersion: string;
  environment: string;
  otlpEndpoint: string;
  enabled: boolean;
}

export type OTelAttributes = Record<string, string | number | boolean>;

export interface OTelHandle {
  /** Exports everything queued so far. */
  flush(): Promise<void>;
  /** Flushes, then detaches the exporter from the client's loggers. */
  shutdown(): Promise<void>;
}

const DISABLED_HANDLE: OTelHandle = {
  flush: () => Promise.resolve(),
  shutdown: () => Promise.resolve(),
};

const SEVERITIES: Record<string, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

export function getOTelConfig(): OTelConfig {
  return {
    serviceName: process.env.OTEL_SERVICE_NAME || "ttrss-feed-client",
    serviceVersion: process.env.SERVICE_VERSION || "1.0.0",
    environment: process.env.DEPLOYMENT_ENV || "development",
    otlpEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT ||
      "http://localhost:4318",
    enabled: (process.env.OTEL_ENABLED || "false").toLowerCase() === "true",
  };
}

let activeProvider: LoggerProvider | null = null;
let activeLogger: Logger | null = null;

/**
 * Starts exporting log records. The exporter defaults to OTLP over HTTP at
 * `<otlpEndpoint>/v1/logs`. A second call replaces the active provider
 * without shutting the old one down.
 */
export function initOTelProvider(
  cfg: OTelConfig = getOTelConfig(),
  exporter?: LogRecordExporter,
): OTelHandle {
  if (!cfg.enabled) {
    return DISABLED_HANDLE;
  }

  const provider = new LoggerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: cfg.serviceName,
      [ATTR_SERVICE_VERSION]: cfg.serviceVersion,
      [ATTR_DEPLOYMENT_ENVIRONMENT]: cfg.environment,
    }),
    processors: [
      new BatchLogRecordProcessor(
        exporter ??
          new OTLPLogExporter({ url: `${cfg.otlpEndpoint}${OTLP_LOGS_PATH}` }),
      ),
    ],
  });

  activeProvider = provider;
  activeLogger = provider.getLogger(cfg.serviceName, cfg.serviceVersion);
  logs.setGlobalLoggerProvider(provider);

  return {
    flush: () => provider.forceFlush(),
    shutdown: async () => {
      if (activeProvider === provider) {
        activeProvider = null;
        activeLogger = null;
        logs.disable();
      }
      await provider.shutdown();
    },
  };
}

export function emitOTelLog(
  level: string,
  message: string,
  attributes: OTelAttributes = {},
): void {
  if (!activeLogger) {
    return;
  }

  activeLogger.emit({
    severityNumber: SEVERITIES[level] ?? SeverityNumber.INFO,
    severityText: level.toUpperCase(),
    body: message,
    attributes,
  });
}

export function isOTelEnabled(): boolean {
  return activeLogger !== null;
}
