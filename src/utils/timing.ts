export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));

/**
 * Exponential backoff delay for a zero-based attempt index: base * 2^attempt.
 */
export function backoffDelay(attempt: number, baseMs: number): number {
  return baseMs * 2 ** attempt;
}
