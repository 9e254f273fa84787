/**
 * @hebrew פונקציית עזר להמתנה (sleep).
 * @param ms - זמן המתנה במילישניות.
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * @hebrew ממתין שכל ההבטחות יסתיימו (בהצלחה או בכשלון), אבל לא יותר מ-`timeoutMs`.
 * הטיימר מנוקה בכל מקרה כדי לא להשאיר את התהליך חי.
 * @returns true אם כולן הסתיימו בזמן, false אם הזמן עבר.
 */
export async function settleWithin(promises: Iterable<Promise<unknown>>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([
      Promise.allSettled(promises).then(() => true),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
