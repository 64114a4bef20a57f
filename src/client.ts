import { TransportError } from "./errors.js";
import { createLogger, type OpLogger } from "./logger.js";
import type { Session } from "./op.js";

export interface ClientOptions {
  hostname: string;
  apiKey: string;
  protocol?: "https" | "http";
  port?: number;
  /** Default `target` (managed device serial) for every command */
  target?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  logger?: OpLogger;
}

export const DEFAULT_TIMEOUT = 10_000;

export class PanoramaClient implements Session {
  readonly logger: OpLogger;
  readonly target?: string;
  private readonly timeout: number;

  constructor(private readonly options: ClientOptions) {
    this.target = options.target;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.logger = (options.logger ?? createLogger()).child({ host: options.hostname });
  }

  buildUrl(): URL {
    const { protocol = "https", port } = this.options;
    // Accept "fw.example.com", "https://fw.example.com/" and the like
    const host = this.options.hostname.replace(/^[a-z]+:\/\//i, "").replace(/\/+$/, "");
    return new URL(`${protocol}://${host}${port ? `:${port}` : ""}/api/`);
  }

  async send(params: Record<string, string>): Promise<string> {
    const url = this.buildUrl();

    let resp: Response;
    try {
      resp = await fetch(url, {
        method: "POST",
        headers: {
          Accept: "application/xml",
          "Content-Type": "application/x-www-form-urlencoded",
          "X-PAN-KEY": this.options.apiKey,
        },
        body: new URLSearchParams(params).toString(),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request to ${url.host} failed: ${message}`, undefined, { cause: err });
    }

    let text: string;
    try {
      text = await resp.text();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Reading reply from ${url.host} failed: ${message}`, { status: resp.status }, { cause: err });
    }
    // Error documents come back with 4xx/5xx; let the executor read the device's message
    if (!resp.ok && !text.trimStart().startsWith("<response")) {
      throw new TransportError(`HTTP ${resp.status}`, { status: resp.status, body: text.slice(0, 500) });
    }
    return text;
  }
}
