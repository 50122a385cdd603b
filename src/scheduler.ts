import { DateTime } from "luxon";
import { errMessage, logger } from "./logger.js";

type JobFn = () => Promise<void> | void;

export type ScheduledJob = {
  stop: () => void;
};

const log = logger.child({ component: "scheduler" });

function clampDelay(ms: number): number {
  if (!Number.isFinite(ms)) return 1000;
  return Math.max(1000, Math.floor(ms));
}

/**
 * Runs `fn` every `intervalMs`, measured from the end of the previous run, so
 * two runs of the same job never overlap. Errors are logged; the next run
 * proceeds as usual.
 */
export function scheduleEvery(name: string, intervalMs: number, fn: JobFn): ScheduledJob {
  const delay = clampDelay(intervalMs);
  let timer: NodeJS.Timeout | undefined;
  let stopped = false;

  async function run() {
    log.debug("Job start", { name, at: DateTime.utc().toISO() });
    try {
      await fn();
    } catch (e) {
      log.error("Job error", { name, error: errMessage(e) });
    } finally {
      log.debug("Job finish", { name, at: DateTime.utc().toISO() });
      if (!stopped) timer = setTimeout(() => void run(), delay);
    }
  }

  log.info("Scheduling job", { name, everyMs: delay });
  timer = setTimeout(() => void run(), delay);

  return {
    stop: () => {
      stopped = true;
      if (timer) clearTimeout(timer);
      log.info("Job stopped", { name });
    },
  };
}
