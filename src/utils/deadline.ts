/**
 * Runs `task` under a hard budget. The task gets a signal that aborts on the
 * deadline or when `parent` aborts; the returned promise rejects right away
 * in either case, without waiting for the task to notice.
 */
export function runWithDeadline<T>(
  budgetMs: number,
  onTimeout: () => Error,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(parent.reason);
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const abort = (reason: unknown) => {
      cleanup();
      controller.abort(reason);
      reject(reason);
    };
    const onParentAbort = () => abort(parent?.reason);
    const timer = setTimeout(() => abort(onTimeout()), budgetMs);
    parent?.addEventListener("abort", onParentAbort, { once: true });

    function cleanup() {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }

    let work: Promise<T>;
    try {
      work = task(controller.signal);
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }

    // A late settlement after abort() is a no-op on the outer promise
    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}
