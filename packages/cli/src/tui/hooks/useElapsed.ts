/**
 * Hook for polling the timer's elapsed time.
 */

import { useState, useEffect, useCallback } from "react";
import type { SessionTimer, TimerStatus } from "@worklog/core";

export interface UseElapsedResult {
  elapsed: number;
  status: TimerStatus;
  /** Re-read the timer now, e.g. right after a start/pause/stop. */
  refresh: () => void;
}

/**
 * Poll `timer.currentElapsed()` every `interval` ms.
 * Polling only reads; the timer is changed by key handlers between polls.
 */
export function useElapsed(
  timer: SessionTimer,
  interval: number
): UseElapsedResult {
  const [elapsed, setElapsed] = useState(() => timer.currentElapsed());
  const [status, setStatus] = useState<TimerStatus>(() => timer.status);

  const refresh = useCallback(() => {
    setElapsed(timer.currentElapsed());
    setStatus(timer.status);
  }, [timer]);

  useEffect(() => {
    const handle = setInterval(refresh, interval);
    return () => clearInterval(handle);
  }, [interval, refresh]);

  return { elapsed, status, refresh };
}
