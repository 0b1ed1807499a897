/**
 * Races `work` against a timer. On expiry `controller` is aborted and the
 * promise rejects with `onTimeout()`. Without `timeoutMs` the work is awaited
 * unbounded.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number | undefined,
  controller: AbortController,
  onTimeout: () => Error,
): Promise<T> {
  if (timeoutMs === undefined) {
    return work;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
