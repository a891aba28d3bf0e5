/**
 * Periodic snapshot refresh inside a long-running server.
 */
import { createLogger } from "../../shared/src/logger.js";
import type { SnapshotUpdater } from "./updater.js";

const log = createLogger("snapshot-scheduler");

const HOUR_MS = 60 * 60 * 1000;

export class SnapshotScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private updater: Pick<SnapshotUpdater, "update">,
    private refreshHours: number,
  ) {}

  /** A refresh interval of 0 disables the scheduler. */
  start(): boolean {
    if (this.timer || this.refreshHours <= 0) return false;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.refreshHours * HOUR_MS);
    this.timer.unref();
    log.info("Snapshot refresh scheduled", { everyHours: this.refreshHours });
    return true;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get active(): boolean {
    return this.timer !== null;
  }

  private async tick(): Promise<void> {
    const ok = await this.updater.update();
    if (!ok) log.warn("Scheduled snapshot refresh failed; keeping previous snapshot");
  }
}
