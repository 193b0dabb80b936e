export type DeadlineOutcome<T> =
  | {
      error: unknown;
      kind: "error";
    }
  | {
      kind: "deadline";
    }
  | {
      kind: "value";
      value: T;
    };

export function remainingUntil(deadline: number | undefined, now: () => number): number {
  return deadline === undefined ? Number.POSITIVE_INFINITY : deadline - now();
}

// Never rejects: a late rejection of the abandoned task is absorbed into its own
// settled promise instead of surfacing as an unhandled rejection.
export async function runWithDeadline<T>(
  task: (abortSignal: AbortSignal) => Promise<T>,
  remainingMs: number
): Promise<DeadlineOutcome<T>> {
  const controller = new AbortController();
  let settled: Promise<DeadlineOutcome<T>>;
  try {
    settled = task(controller.signal).then(
      (value): DeadlineOutcome<T> => ({ kind: "value", value }),
      (error: unknown): DeadlineOutcome<T> => ({ error, kind: "error" })
    );
  } catch (error) {
    return { error, kind: "error" };
  }

  if (!Number.isFinite(remainingMs)) {
    return settled;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<DeadlineOutcome<T>>((resolveExpired) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      resolveExpired({ kind: "deadline" });
    }, Math.max(0, remainingMs));
  });

  try {
    return await Promise.race([settled, expired]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
