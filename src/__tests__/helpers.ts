import { createLogger, type OpLogger } from "../logger.js";
import type { Session } from "../op.js";

export interface FakeSession extends Session {
  /** API parameters of every call, in order */
  sent: Record<string, string>[];
}

type Reply = string | Error;

/**
 * In-process stand-in for a connection: replays canned replies in order,
 * or asks `replies` for one per call when it is a function.
 */
export function fakeSession(
  replies: Reply[] | ((params: Record<string, string>, call: number) => Reply),
  logger: OpLogger = createLogger("silent"),
): FakeSession {
  const queue = Array.isArray(replies) ? [...replies] : [];
  const sent: Record<string, string>[] = [];

  return {
    logger,
    sent,
    async send(params) {
      sent.push(params);
      const next = Array.isArray(replies) ? queue.shift() : replies(params, sent.length);
      if (next === undefined) throw new Error(`No reply queued for call ${sent.length}`);
      if (next instanceof Error) throw next;
      return next;
    },
  };
}

export function ok(body: string): string {
  return `<response status="success">${body}</response>`;
}

export function jobReply(id: string, status: string, result: string, progress: number, extra = ""): string {
  return ok(
    `<result><job><id>${id}</id><type>MoveDG</type><status>${status}</status>` +
    `<result>${result}</result><progress>${progress}</progress>${extra}</job></result>`,
  );
}

/** Logger writing JSON lines into `lines` */
export function captureLogger(lines: Record<string, unknown>[], level: Parameters<typeof createLogger>[0] = "op"): OpLogger {
  return createLogger(level, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
}
