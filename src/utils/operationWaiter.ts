import {
  OPERATION_POLL_INTERVAL_MS,
  OPERATION_TIMEOUT_MS,
} from "../config/gcpConfig";
import type { OperationHandle, OperationPoll } from "../types";
import {
  errorMessage,
  OperationFailedError,
  OperationTimeoutError,
} from "./errors";
import logger from "./logger";

export interface WaitOptions {
  /** `null` waits indefinitely */
  timeoutMs?: number | null;
  pollIntervalMs?: number;
}

const TIMED_OUT = Symbol("timed-out");

// Node fires longer timers after 1ms
const MAX_TIMER_MS = 2 ** 31 - 1;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) =>
    setTimeout(resolve, Math.max(0, Math.min(ms, MAX_TIMER_MS)))
  );
}

/**
 * Resolves with the poll, or with TIMED_OUT once `remaining()` reaches zero
 * while the poll is still in flight. Long deadlines are armed in chunks.
 */
async function pollBefore<T>(
  poll: Promise<OperationPoll<T>>,
  remaining: () => number | null
): Promise<OperationPoll<T> | typeof TIMED_OUT> {
  for (;;) {
    const left = remaining();
    if (left === null) return poll;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(
        () => resolve(TIMED_OUT),
        Math.max(0, Math.min(left, MAX_TIMER_MS))
      );
    });
    try {
      const outcome = await Promise.race([poll, deadline]);
      if (outcome !== TIMED_OUT || left <= MAX_TIMER_MS) return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Waits for a long-running operation to reach a terminal state.
 *
 * Resolves with the operation's result. Warnings are logged and do not fail
 * the wait. Rejects with the operation's own error, an OperationFailedError
 * when the provider set an error code, or an OperationTimeoutError when
 * `timeoutMs` elapses first.
 */
export async function waitForOperation<T>(
  handle: OperationHandle<T>,
  label = "operation",
  options: WaitOptions = {}
): Promise<T> {
  const timeoutMs =
    options.timeoutMs === undefined ? OPERATION_TIMEOUT_MS : options.timeoutMs;
  const pollIntervalMs = options.pollIntervalMs ?? OPERATION_POLL_INTERVAL_MS;
  const start = Date.now();
  const remaining = () =>
    timeoutMs === null ? null : timeoutMs - (Date.now() - start);

  for (;;) {
    const inFlight = handle.poll();
    const poll = await pollBefore(inFlight, remaining);

    if (poll === TIMED_OUT) {
      void inFlight.catch((error: unknown) =>
        logger.warn(`Poll for ${label} failed after timeout`, {
          operationId: handle.name,
          error: errorMessage(error),
        })
      );
      throw new OperationTimeoutError(label, handle.name, timeoutMs ?? 0);
    }

    switch (poll.state) {
      case "done":
        return poll.result;

      case "doneWithWarnings":
        for (const warning of poll.warnings) {
          logger.warn(`Warning during ${label}: ${warning.code}`, {
            label,
            code: warning.code,
            message: warning.message,
            operationId: handle.name,
          });
        }
        return poll.result;

      case "failed":
        logger.error(`Error during ${label}: [Code: ${poll.code}]`, {
          label,
          code: poll.code,
          message: poll.message,
          operationId: handle.name,
        });
        throw (
          poll.cause ??
          new OperationFailedError(poll.message, poll.code, handle.name)
        );

      case "pending": {
        const left = remaining();
        if (left !== null && left <= 0) {
          throw new OperationTimeoutError(label, handle.name, timeoutMs ?? 0);
        }
        await sleep(left === null ? pollIntervalMs : Math.min(pollIntervalMs, left));
        break;
      }
    }
  }
}
