import type { AppConfig } from "../../../../config/appConfig.js";
import { createLogger, type Logger } from "../logger.js";

export type ErrorSource = Record<string, string>;

/** What the interceptor knows about a failure. */
export interface ErrorRecord {
  source: ErrorSource;
  function_name: string;
  error_type: string;
  error_message: string;
  stack: string | null;
  user_id: string;
  input: unknown;
  context: Record<string, unknown>;
}

export interface ErrorReporter {
  /** Resolves true when the record was delivered. Never rejects. */
  report(record: ErrorRecord): Promise<boolean>;
}

export const REPORT_TIMEOUT_MS = 10_000;

/** "tool(workflow).function", falling back to "unknown" for the tool. */
export function buildFlowName(source: ErrorSource, functionName: string): string {
  let flowName = source["tool"] ?? "unknown";
  if (source["workflow"]) flowName = `${flowName}(${source["workflow"]})`;
  return functionName ? `${flowName}.${functionName}` : flowName;
}

function serializeInput(input: unknown): string {
  if (input === undefined || input === null) return "";
  if (typeof input === "string") return input;
  try {
    return JSON.stringify(input);
  } catch {
    return String(input);
  }
}

/** Body accepted by the error-interceptor endpoint. */
export function buildInterceptorPayload(record: ErrorRecord) {
  return {
    customer_whatsapp_number: record.user_id,
    source: JSON.stringify({ ...record.source, function: record.function_name }, null, 2),
    flowname: buildFlowName(record.source, record.function_name),
    api_endpoint: `internal://${record.error_type}`,
    input_body: serializeInput(record.input),
    http_status_code: 0,
    error_response: JSON.stringify({ error_message: record.error_message, traceback: record.stack ?? "" }),
  };
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class HttpErrorReporter implements ErrorReporter {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(
    private readonly config: { url: string | null; token: string | null },
    deps: { fetchImpl?: FetchLike; logger?: Logger } = {}
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.logger = deps.logger ?? createLogger("error-reporter");
  }

  async report(record: ErrorRecord): Promise<boolean> {
    const { url, token } = this.config;
    if (!url || !token) {
      this.logger.warn("error interceptor not configured (url or token missing); error not reported");
      return false;
    }
    const payload = buildInterceptorPayload(record);
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { accept: "application/json", "x-api-key": token, "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(REPORT_TIMEOUT_MS),
      });
      if (response.status !== 200) {
        const body = await response.text().catch(() => "");
        this.logger.warn({ status: response.status, body: body.slice(0, 200) }, "error interceptor rejected report");
        return false;
      }
      this.logger.info({ flowname: payload.flowname, errorType: record.error_type }, "error reported to interceptor");
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "failed to send error to interceptor");
      return false;
    }
  }
}

/** Used when no interceptor endpoint is configured: the record only reaches the log. */
export class LoggingErrorReporter implements ErrorReporter {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger("error-reporter");
  }

  async report(record: ErrorRecord): Promise<boolean> {
    this.logger.error(
      {
        flowname: buildFlowName(record.source, record.function_name),
        errorType: record.error_type,
        userId: record.user_id,
        context: record.context,
        stack: record.stack,
      },
      record.error_message
    );
    return false;
  }
}

export function createErrorReporter(config: Pick<AppConfig, "errorInterceptor">, logger?: Logger): ErrorReporter {
  const { url, token } = config.errorInterceptor;
  if (url && token) return new HttpErrorReporter({ url, token }, { logger });
  return new LoggingErrorReporter(logger);
}
