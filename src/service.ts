import type { AppConfig } from "./config";
import { normalizeError } from "./errors";
import { UpkeepKeeper } from "./keeper";
import type { AppLogger } from "./logger";
import { Raffle, type Clock } from "./raffle";
import { LocalRandomnessCoordinator } from "./randomness";
import type { RaffleRepository } from "./repository";
import type { RaffleEvent } from "./types";
import { PrizeVault } from "./vault";

export type RaffleService = {
  raffle: Raffle;
  vault: PrizeVault;
  coordinator: LocalRandomnessCoordinator;
  keeper: UpkeepKeeper;
  persist(): void;
  stop(): void;
};

export type ServiceOptions = {
  clock?: Clock;
  generate?: () => bigint;
};

function logEvent(logger: AppLogger, event: RaffleEvent): void {
  switch (event.type) {
    case "entered_raffle":
      logger.info("raffle_entered", { participant: event.participant, stake: event.stake });
      return;
    case "requested_draw":
      logger.info("draw_requested", { requestId: event.requestId });
      return;
    case "winner_picked":
      logger.info("winner_picked", {
        participant: event.participant,
        amount: event.amount,
        requestId: event.requestId,
      });
      return;
  }
}

export function createRaffleService(
  config: Pick<AppConfig, "raffle" | "coordinatorFulfillDelayMs" | "keeperCheckIntervalMs">,
  logger: AppLogger,
  repository: RaffleRepository,
  options: ServiceOptions = {},
): RaffleService {
  const stored = repository.load();
  const vault = new PrizeVault(stored?.vault);
  const coordinator = new LocalRandomnessCoordinator({
    id: config.raffle.coordinatorId,
    logger,
    ...(config.coordinatorFulfillDelayMs > 0 ? { fulfillDelayMs: config.coordinatorFulfillDelayMs } : {}),
    ...(options.clock ? { clock: options.clock } : {}),
    ...(options.generate ? { generate: options.generate } : {}),
    ...(stored ? { initial: stored.coordinator } : {}),
  });
  const raffle = new Raffle({
    settings: config.raffle,
    randomness: coordinator,
    funds: vault,
    logger,
    ...(options.clock ? { clock: options.clock } : {}),
    ...(stored ? { initial: stored.raffle } : {}),
  });
  coordinator.attach(raffle);
  const keeper = new UpkeepKeeper(raffle, logger, config.keeperCheckIntervalMs);

  const persist = (): void => {
    repository.save({
      raffle: raffle.snapshot(),
      vault: vault.snapshot(),
      coordinator: coordinator.snapshot(),
    });
  };

  raffle.on((event) => {
    try {
      logEvent(logger, event);
      persist();
    } catch (error) {
      logger.error("persist_failed", { event: event.type, ...normalizeError(error) });
    }
  });

  if (stored) {
    logger.info("raffle_restored", {
      roundState: stored.raffle.roundState,
      participants: stored.raffle.participants.length,
      pendingRequests: stored.coordinator.pending.length,
    });
  } else {
    persist();
  }
  coordinator.resume();

  return {
    raffle,
    vault,
    coordinator,
    keeper,
    persist,
    stop: () => {
      keeper.stop();
      coordinator.stop();
    },
  };
}
