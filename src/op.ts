import { ApiError, DeserializationError } from "./errors.js";
import type { OpLogger } from "./logger.js";
import { describeRequest, parseDocument, select, text, texts, toXml, type CommandRequest, type Decoder } from "./xml.js";

/** What the executor needs from a connection: a logger and a way to send API parameters */
export interface Session {
  readonly logger: OpLogger;
  /** Default managed-device serial for commands that do not name one */
  readonly target?: string;
  send(params: Record<string, string>): Promise<string>;
}

export interface OpOptions {
  /** Managed device serial; overrides the session default */
  target?: string;
  /** Additional API parameters sent alongside `type` and `cmd` */
  extras?: Record<string, string>;
  /** Human-readable description for the op log */
  description?: string;
}

export interface OpResult<T> {
  raw: string;
  data: T;
}

/**
 * Run one operational command and decode the reply.
 *
 * `decoder` receives the `<response>` element, so its paths start at
 * `result`. Transport errors propagate as thrown by the session.
 */
export async function op<T>(
  session: Session,
  request: CommandRequest | string,
  decoder: Decoder<T>,
  options: OpOptions = {},
): Promise<OpResult<T>> {
  const cmd = typeof request === "string" ? request : toXml(request);
  const target = options.target ?? session.target;

  session.logger.op(
    { target },
    options.description ?? `(op) ${typeof request === "string" ? "raw command" : describeRequest(request)}`,
  );

  const params: Record<string, string> = { ...options.extras, type: "op", cmd };
  if (target) params.target = target;

  const raw = await session.send(params);
  const response = responseElement(raw);
  return { raw, data: decoder(response) };
}

function responseElement(raw: string): unknown {
  const [response] = select(parseDocument(raw), "response");
  if (response === undefined) {
    throw new DeserializationError("Reply has no <response> element", raw);
  }

  if (text("@status")(response) === "error") {
    const lines = [
      ...texts("msg>line")(response),
      ...texts("result>msg>line")(response),
    ];
    if (!lines.length) {
      lines.push(...[text("msg")(response), text("result>msg")(response)].filter(Boolean));
    }
    const code = text("@code")(response);
    throw new ApiError(lines, code || undefined);
  }

  return response;
}
