/**
 * Cooldown between daemon restarts.
 */

/**
 * Milliseconds to wait before the daemon may be restarted again.
 * Zero when there has been no restart yet or the cooldown has passed.
 */
export function timeUntilReady(
  now: number,
  lastRestartAt: number | null,
  cooldownSeconds: number,
): number {
  if (lastRestartAt === null) return 0;
  return Math.max(0, cooldownSeconds * 1000 - (now - lastRestartAt));
}
