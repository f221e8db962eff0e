import * as Sentry from "@sentry/node";

export interface TelemetryOptions {
  release?: string;
  environment?: string;
  sentryDsn?: string;
  /**
   * Additional context shared with all events
   */
  context?: Record<string, unknown>;
}

export interface TelemetryClient {
  enabled: boolean;
  flush: (timeoutMs?: number) => Promise<boolean>;
}

export function initTelemetry(options: TelemetryOptions): TelemetryClient {
  const enabled = Boolean(options.sentryDsn);

  if (enabled) {
    Sentry.init({
      dsn: options.sentryDsn,
      release: options.release,
      environment: options.environment,
      tracesSampleRate: 0,
      initialScope: options.context ? { extra: options.context } : undefined,
    });
  }

  const flush = async (timeoutMs = 3000) => {
    if (!enabled) return true;
    return Sentry.flush(timeoutMs);
  };

  return { enabled, flush };
}

export {
  createLogger,
  debugLog,
  infoLog,
  warnLog,
  errorLog,
  type Logger,
} from "./logger";
