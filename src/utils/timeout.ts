export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timeout after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export const withTimeout = async <T>(
  promise: Promise<T>,
  timeoutMs: number,
  label = "Operation"
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(label, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const backoffDelay = (
  attempt: number,
  baseDelay: number,
  maxDelay: number
): number => Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
