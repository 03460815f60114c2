import type { BlockRecord } from "@stanza/core-model";

export type AutosaveStatus = "idle" | "pending" | "saving" | "failed";

type TimerHandle = ReturnType<typeof setTimeout>;

export type AutosaveOptions = {
  save: (records: BlockRecord[]) => Promise<void> | void;
  /** Quiet period after the last change before writing. */
  debounceMs?: number;
  /** Longest a change may wait while edits keep arriving. */
  maxWaitMs?: number;
  retryMs?: number;
  onStatusChange?: (status: AutosaveStatus) => void;
  onError?: (error: unknown) => void;
};

export type Autosave = {
  schedule: (records: BlockRecord[]) => void;
  flush: () => Promise<void>;
  status: () => AutosaveStatus;
  dispose: () => void;
};

export const DEFAULT_AUTOSAVE_DEBOUNCE_MS = 2000;

const reportSaveError = (error: unknown) => {
  console.warn("Autosave failed, will retry", error);
};

/**
 * Saves the latest records of one document. Only the newest records are
 * kept; a write that starts while another is in flight waits for it.
 */
export const createAutosave = ({
  save,
  debounceMs = DEFAULT_AUTOSAVE_DEBOUNCE_MS,
  maxWaitMs = 10_000,
  retryMs = 5000,
  onStatusChange,
  onError = reportSaveError
}: AutosaveOptions): Autosave => {
  let latest: BlockRecord[] | null = null;
  let inFlight: Promise<void> | null = null;
  let current: AutosaveStatus = "idle";
  let disposed = false;
  let quietTimer: TimerHandle | null = null;
  let deadlineTimer: TimerHandle | null = null;

  const setStatus = (next: AutosaveStatus) => {
    if (next === current) return;
    current = next;
    onStatusChange?.(next);
  };

  const cancelTimers = () => {
    if (quietTimer !== null) clearTimeout(quietTimer);
    if (deadlineTimer !== null) clearTimeout(deadlineTimer);
    quietTimer = null;
    deadlineTimer = null;
  };

  const armQuietTimer = (delay: number) => {
    if (quietTimer !== null) clearTimeout(quietTimer);
    quietTimer = setTimeout(() => {
      quietTimer = null;
      void flush();
    }, delay);
  };

  const write = async (records: BlockRecord[]) => {
    setStatus("saving");
    try {
      await save(records);
    } catch (error) {
      onError(error);
      if (disposed) {
        setStatus("idle");
        return;
      }
      latest ??= records;
      setStatus("failed");
      armQuietTimer(retryMs);
      return;
    }
    if (latest && !disposed) {
      setStatus("pending");
      armQuietTimer(debounceMs);
    } else {
      setStatus("idle");
    }
  };

  const flush = async (): Promise<void> => {
    while (inFlight) {
      await inFlight;
    }
    cancelTimers();
    if (!latest || disposed) return;
    const records = latest;
    latest = null;
    inFlight = write(records).finally(() => {
      inFlight = null;
    });
    await inFlight;
  };

  const schedule = (records: BlockRecord[]) => {
    if (disposed) return;
    latest = records;
    if (current !== "saving") setStatus("pending");
    armQuietTimer(debounceMs);
    if (deadlineTimer === null) {
      deadlineTimer = setTimeout(() => {
        deadlineTimer = null;
        void flush();
      }, maxWaitMs);
    }
  };

  return {
    schedule,
    flush,
    status: () => current,
    dispose: () => {
      disposed = true;
      latest = null;
      cancelTimers();
      if (!inFlight) setStatus("idle");
    }
  };
};
