export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 500, 'config_error');
    this.problems = problems;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, 'bad_request');
  }
}

/** Upstream answered with a status we will not retry, or retries ran out. */
export class HttpStatusError extends AppError {
  readonly upstreamStatus: number;
  readonly url: string;

  constructor(upstreamStatus: number, statusText: string, url: string, detail = '') {
    super(`HTTP ${upstreamStatus} ${statusText}${detail ? `: ${detail}` : ''}`, 502, 'upstream_status');
    this.upstreamStatus = upstreamStatus;
    this.url = url;
  }
}

export class ProviderError extends AppError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`${provider}: ${message}`, 502, 'provider_error', options);
    this.provider = provider;
  }
}

export class MalformedResponseError extends AppError {
  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`${provider} returned a malformed response: ${message}`, 502, 'malformed_response', options);
  }
}

export class ReportFormatError extends AppError {
  constructor(format: string) {
    super(`Unknown report format "${format}" (expected text, markdown or html)`, 400, 'report_format');
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
