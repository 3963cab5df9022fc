/**
 * Hard deadlines for probe calls.
 *
 * The task gets its own AbortSignal, linked to the caller's. When the
 * deadline passes or the caller aborts, the returned promise rejects at
 * once and whatever the task resolves with later is dropped.
 */

export class ProbeTimeoutError extends Error {
  constructor(label: string, public readonly ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "ProbeTimeoutError";
  }
}

export class ProbeAbortedError extends Error {
  constructor(label: string) {
    super(`${label} was cancelled`);
    this.name = "ProbeAbortedError";
  }
}

export function withDeadline<T>(
  label: string,
  ms: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();

  if (parent?.aborted) {
    return Promise.reject(new ProbeAbortedError(label));
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
      fn();
    };

    const onAbort = () => {
      finish(() => reject(new ProbeAbortedError(label)));
      controller.abort();
    };

    const timer = setTimeout(() => {
      finish(() => reject(new ProbeTimeoutError(label, ms)));
      controller.abort();
    }, ms);

    parent?.addEventListener("abort", onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (err: unknown) {
      pending = Promise.reject(err);
    }

    pending.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}
