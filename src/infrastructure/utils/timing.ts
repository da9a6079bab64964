export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/** Milliseconds left until `deadline` (epoch ms), never negative */
export function remainingUntil(deadline: number): number {
  return Math.max(0, deadline - Date.now());
}
