import type { JobStatus } from "./jobs.js";

/** Base class for every error this package throws on purpose */
export class PanoramaError extends Error {
  readonly detail?: unknown;

  constructor(message: string, detail?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.detail = detail;
  }
}

/** Network failure, request timeout, or an HTTP status the API did not answer with a document */
export class TransportError extends PanoramaError {
  readonly status?: number;

  constructor(message: string, detail?: { status?: number; body?: string }, options?: ErrorOptions) {
    super(message, detail, options);
    this.status = detail?.status;
  }
}

/** The reply was not a well-formed response document */
export class DeserializationError extends PanoramaError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message, { raw: raw.slice(0, 500) });
    this.raw = raw;
  }
}

/** The device answered `status="error"` */
export class ApiError extends PanoramaError {
  readonly code?: string;
  readonly lines: string[];

  constructor(lines: string[], code?: string) {
    const text = lines.length ? lines.join(" | ") : "Request failed without a message";
    super(code ? `${text} (code ${code})` : text, { code, lines });
    this.code = code;
    this.lines = lines;
  }
}

/** Well-formed reply with content the command did not expect */
export class FormatError extends PanoramaError {
  constructor(message: string, raw: string) {
    super(`${message}: ${raw}`, { raw });
  }
}

export class JobFailedError extends PanoramaError {
  readonly jobId: string;

  constructor(jobId: string, message: string, details: string[]) {
    super(message, { jobId, details });
    this.jobId = jobId;
  }
}

export class JobTimeoutError extends PanoramaError {
  readonly jobId: string;

  constructor(jobId: string, timeout: number, last: JobStatus) {
    super(`Job ${jobId} did not finish within ${timeout}ms (last status ${last.status || "unknown"}, ${last.progress}%)`, {
      jobId,
      timeout,
      last,
    });
    this.jobId = jobId;
  }
}

/** Bad arguments or configuration supplied by the caller */
export class UsageError extends PanoramaError {}
