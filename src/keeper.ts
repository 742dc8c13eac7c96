import { normalizeError, UpkeepNotNeededError } from "./errors";
import type { AppLogger } from "./logger";
import type { Raffle } from "./raffle";

export type KeeperTickResult =
  | { status: "idle" }
  | { status: "requested"; requestId: bigint }
  | { status: "failed"; error: string };

/** Plays the external upkeep caller: polls eligibility and triggers the draw. */
export class UpkeepKeeper {
  private readonly raffle: Raffle;
  private readonly logger: AppLogger;
  private readonly checkIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(raffle: Raffle, logger: AppLogger, checkIntervalMs: number) {
    this.raffle = raffle;
    this.logger = logger;
    this.checkIntervalMs = checkIntervalMs;
  }

  start(): void {
    if (this.timer || this.checkIntervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick();
    }, this.checkIntervalMs);
    this.logger.info("keeper_started", { checkIntervalMs: this.checkIntervalMs });
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("keeper_stopped");
  }

  tick(): KeeperTickResult {
    if (!this.raffle.checkUpkeep()) {
      return { status: "idle" };
    }
    try {
      const requestId = this.raffle.performUpkeep();
      return { status: "requested", requestId };
    } catch (error) {
      if (error instanceof UpkeepNotNeededError) {
        this.logger.warn("upkeep_skipped", error.details);
        return { status: "idle" };
      }
      this.logger.error("upkeep_failed", normalizeError(error));
      return { status: "failed", error: normalizeError(error).message };
    }
  }
}
