/** Longest delay setTimeout accepts; Node fires larger ones after 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface TimerHandle {
  cancel(): void;
}

/**
 * setTimeout for any delay. Delays past the 32-bit limit re-arm in chunks.
 */
export function scheduleTimeout(callback: () => void, delayMs: number): TimerHandle {
  let remaining = Math.max(0, delayMs);
  let timer: NodeJS.Timeout | undefined;

  const arm = () => {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    timer = setTimeout(() => {
      remaining -= chunk;
      if (remaining > 0) arm();
      else callback();
    }, chunk);
  };
  arm();

  return {
    cancel: () => clearTimeout(timer),
  };
}
