// src/state/gc/upload.gc.scheduler.ts

import type { EngineLogger } from "../../utils/logger.js";
import { runUploadGc, type SweepDeps } from "./upload.gc.worker.js";

export class UploadGcScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  private readonly log: EngineLogger;

  constructor(
    private readonly deps: SweepDeps,
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.log = deps.log;
  }

  start() {
    if (this.timer) return;

    this.log.info({ intervalMs: this.intervalMs }, "Upload GC started");

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    this.timer.unref();
  }

  /** Runs one sweep now unless one is already in flight. */
  tick(): Promise<void> {
    if (this.running) return this.running; // prevent overlap

    this.running = runUploadGc(this.deps, this.now())
      .then((report) => {
        if (report.expired.length || report.failures.length) {
          this.log.info(
            {
              scanned: report.scanned,
              expired: report.expired.length,
              failures: report.failures.length,
            },
            "Upload GC sweep finished"
          );
        }
      })
      .catch((err) => {
        this.log.error({ err }, "Upload GC failed");
      })
      .finally(() => {
        this.running = null;
      });

    return this.running;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.running) {
      await this.running;
    }
  }
}
