/**
 * UTC timestamp at seconds resolution with a literal Z suffix, e.g. "2025-12-03T10:30:00Z".
 * This is the only form the drilling-speed endpoint accepts.
 */
export function toUtcSecondsIso(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Wait for a promise for at most `ms` milliseconds.
 * Resolves true when it settled in time, false when the bound elapsed first.
 * Rejections count as settled; callers pass promises that handle their own errors.
 */
export async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  const settled = promise.then(
    () => true as const,
    () => true as const
  );

  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
