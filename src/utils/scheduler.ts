/**
 * One-shot timer source. Workers own the handles they schedule; tests swap in
 * a manually advanced implementation.
 */
export interface TimerHandle {
  cancel(): void;
}

export interface Scheduler {
  schedule(callback: () => void, delayMs: number): TimerHandle;
}

export const systemScheduler: Scheduler = {
  schedule(callback: () => void, delayMs: number): TimerHandle {
    const timer = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(timer)
    };
  }
};
