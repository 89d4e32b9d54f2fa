/**
 * Timing helpers shared by the retry policy, the consumer and the transport adapter.
 */

/**
 * Resolves after `ms` milliseconds.
 */
export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));

/**
 * Races a promise against a timer. A non-positive timeout disables the race.
 *
 * @param promise - Work to wait for
 * @param ms - Timeout in milliseconds
 * @param message - Message of the error raised on timeout
 */
export const withTimeout = async <T>(promise: Promise<T>, ms: number, message: string): Promise<T> => {
  if (ms <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};
