export class CourseQueryTimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'CourseQueryTimeoutError';
  }
}

/**
 * Settles with `work` or rejects with CourseQueryTimeoutError, whichever comes
 * first. Only this promise is affected; other in-flight calls keep running.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CourseQueryTimeoutError(label, timeoutMs)), timeoutMs);
  });

  return Promise.race([work, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
