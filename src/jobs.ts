import { setTimeout as delay } from "node:timers/promises";
import { FormatError, JobFailedError, JobTimeoutError } from "./errors.js";
import { op, type Session } from "./op.js";
import { command, int, list, text, texts, type Decoder } from "./xml.js";

export const DEFAULT_POLL_INTERVAL = 1_000;
export const DEFAULT_JOB_TIMEOUT = 10 * 60_000;
/** Upper bound on the poll interval; Node timers overflow past 2^31-1 ms */
export const MAX_POLL_INTERVAL = 60 * 60_000;

export interface JobDevice {
  serial: string;
  name: string;
  result: string;
  details: string[];
}

export interface JobStatus {
  id: string;
  type: string;
  /** PEND, ACT or FIN */
  status: string;
  /** PEND, OK or FAIL */
  result: string;
  progress: number;
  details: string[];
  /** Per-device results for jobs pushed to managed devices */
  devices: JobDevice[];
}

export type JobState = "pending" | "active" | "completed" | "failed";

export interface JobSettings {
  /** Milliseconds between polls; 0 picks the default */
  pollInterval: number;
  /** Milliseconds before giving up */
  timeout: number;
}

export interface WaitOptions extends Partial<Pick<JobSettings, "pollInterval">> {
  timeout: number;
  signal?: AbortSignal;
  /** Called once per poll with the status just observed */
  onProgress?: (job: JobStatus) => void;
}

const jobDevice: Decoder<JobDevice> = (node) => ({
  serial: text("serial-no")(node),
  name: text("devicename")(node),
  result: text("result")(node),
  details: texts("details>msg>errors>line")(node),
});

const jobStatus: Decoder<JobStatus> = (node) => ({
  id: text("result>job>id")(node),
  type: text("result>job>type")(node),
  status: text("result>job>status")(node),
  result: text("result>job>result")(node),
  progress: int("result>job>progress")(node),
  details: texts("result>job>details>line")(node),
  devices: list("result>job>devices>entry", jobDevice)(node),
});

export function showJobRequest(id: string) {
  return command("show", { path: "jobs>id", value: id });
}

export function jobState(job: JobStatus): JobState {
  switch (job.status) {
    case "FIN":
      if (job.devices.some((d) => d.result === "PEND")) return "active";
      return job.result === "FAIL" ? "failed" : "completed";
    case "ACT":
      return "active";
    default:
      return "pending";
  }
}

export async function showJob(session: Session, id: string): Promise<JobStatus> {
  const { raw, data } = await op(session, showJobRequest(id), jobStatus, {
    description: `(op) checking job ${id}`,
  });
  if (!data.id) throw new FormatError(`No job ${id} in reply`, raw);
  return data;
}

/**
 * Poll a job until it completes or fails.
 *
 * The wait is bounded by `timeout`; `signal` cancels it between polls.
 * Resolves with the final status, rejects with JobFailedError when the
 * device reports a failure.
 */
export async function waitForJob(session: Session, id: string, options: WaitOptions): Promise<JobStatus> {
  const { signal, onProgress, timeout } = options;
  const interval = options.pollInterval && options.pollInterval > 0 ? options.pollInterval : DEFAULT_POLL_INTERVAL;
  if (!(timeout > 0)) throw new RangeError(`Job timeout must be positive, got ${timeout}`);
  if (interval > MAX_POLL_INTERVAL) {
    throw new RangeError(`Job poll interval must be at most ${MAX_POLL_INTERVAL}ms, got ${interval}`);
  }

  const log = session.logger;
  const deadline = Date.now() + timeout;
  let progress = -1;
  let announcedDevices = false;

  log.op(`(op) waiting for job ${id}`);

  for (;;) {
    signal?.throwIfAborted();
    const job = await showJob(session, id);

    if (onProgress) {
      try {
        onProgress(job);
      } catch (err: unknown) {
        log.warn({ err, job: id }, "progress callback failed");
      }
    }

    if (job.progress !== progress) {
      progress = job.progress;
      log.op(`(op) job ${id}: ${progress} percent complete`);
    }

    const state = jobState(job);
    if (state === "completed" || state === "failed") {
      for (const d of job.devices) log.op(`(op) job ${id}: device ${d.serial} result ${d.result}`);
      return finish(job);
    }
    if (job.status === "FIN" && !announcedDevices) {
      log.op(`(op) job ${id}: waiting for ${job.devices.length} device commits`);
      announcedDevices = true;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new JobTimeoutError(id, timeout, job);
    await delay(Math.min(interval, remaining), undefined, { signal });
  }
}

function finish(job: JobStatus): JobStatus {
  if (job.result === "FAIL") {
    const message = job.details.length ? job.details.join(" | ") : `Job ${job.id} has failed to complete successfully`;
    throw new JobFailedError(job.id, message, job.details);
  }
  const failed = job.devices.filter((d) => d.result !== "OK");
  if (failed.length) {
    throw new JobFailedError(
      job.id,
      `Commit failed on one or more devices: ${failed.map((d) => d.serial).join(", ")}`,
      failed.flatMap((d) => d.details),
    );
  }
  return job;
}
