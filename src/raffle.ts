import {
  DuplicateOrUnknownRequestError,
  InsufficientStakeError,
  InvalidParticipantError,
  OnlyCoordinatorCanFulfillError,
  RoundNotOpenError,
  TransferFailedError,
  UpkeepNotNeededError,
  normalizeError,
} from "./errors";
import type { AppLogger } from "./logger";
import type { RandomnessClient, RandomnessConsumer } from "./randomness";
import type {
  DrawRequestParameters,
  RaffleEvent,
  RaffleListener,
  RaffleSettings,
  RaffleSnapshot,
  RoundState,
  WinnerRecord,
} from "./types";
import type { FundTransfer } from "./vault";

export type Clock = () => number;

export type RaffleDeps = {
  settings: RaffleSettings;
  randomness: RandomnessClient;
  funds: FundTransfer;
  clock?: Clock;
  consumerId?: string;
  initial?: RaffleSnapshot;
  logger?: AppLogger;
};

function copyRound(round: RaffleSnapshot): RaffleSnapshot {
  return {
    roundState: round.roundState,
    participants: [...round.participants],
    lastTimestamp: round.lastTimestamp,
    ...(round.pendingRequestId !== undefined ? { pendingRequestId: round.pendingRequestId } : {}),
    ...(round.recentWinner ? { recentWinner: { ...round.recentWinner } } : {}),
  };
}

/**
 * Single-round raffle. Every operation is synchronous, so the event loop serializes them;
 * the only asynchronous edge is the gap between `performUpkeep` and the coordinator calling
 * `fulfillRandomValue`.
 */
export class Raffle implements RandomnessConsumer {
  readonly consumerId: string;
  private readonly settings: Readonly<RaffleSettings>;
  private readonly randomness: RandomnessClient;
  private readonly funds: FundTransfer;
  private readonly clock: Clock;
  private readonly logger: AppLogger | undefined;
  private readonly listeners = new Set<RaffleListener>();
  private round: RaffleSnapshot;
  // Non-null while a fulfillment is staged; events wait here until it commits.
  private staged: RaffleEvent[] | null = null;

  constructor(deps: RaffleDeps) {
    if (deps.settings.entranceFee <= 0n) {
      throw new RangeError("entranceFee must be positive.");
    }
    if (!Number.isFinite(deps.settings.intervalMs) || deps.settings.intervalMs < 0) {
      throw new RangeError("intervalMs must be a non-negative number.");
    }
    this.settings = Object.freeze({
      ...deps.settings,
      requestParameters: Object.freeze({ ...deps.settings.requestParameters }),
    });
    this.randomness = deps.randomness;
    this.funds = deps.funds;
    this.clock = deps.clock ?? Date.now;
    this.consumerId = deps.consumerId ?? "raffle";
    this.logger = deps.logger;
    if (deps.initial?.roundState === "calculating") {
      if (deps.initial.participants.length === 0 || deps.initial.pendingRequestId === undefined) {
        throw new RangeError("A calculating round needs participants and an outstanding request id.");
      }
    }
    this.round = deps.initial
      ? copyRound(deps.initial)
      : { roundState: "open", participants: [], lastTimestamp: this.clock() };
  }

  on(listener: RaffleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  enterRaffle(participant: string, stake: bigint): void {
    if (!participant.trim()) {
      throw new InvalidParticipantError(participant);
    }
    if (stake < this.settings.entranceFee) {
      throw new InsufficientStakeError(stake, this.settings.entranceFee);
    }
    if (this.round.roundState !== "open") {
      throw new RoundNotOpenError();
    }

    this.funds.deposit(participant, stake);
    this.round.participants.push(participant);
    this.publish({ type: "entered_raffle", participant, stake });
  }

  checkUpkeep(): boolean {
    const timePassed = this.clock() - this.round.lastTimestamp >= this.settings.intervalMs;
    const isOpen = this.round.roundState === "open";
    const hasBalance = this.funds.heldBalance() > 0n;
    const hasParticipants = this.round.participants.length > 0;
    return timePassed && isOpen && hasBalance && hasParticipants;
  }

  performUpkeep(): bigint {
    if (!this.checkUpkeep()) {
      throw new UpkeepNotNeededError(
        this.funds.heldBalance(),
        this.round.participants.length,
        this.round.roundState,
      );
    }

    // Entries close before the coordinator is contacted.
    this.round.roundState = "calculating";
    let requestId: bigint;
    try {
      requestId = this.randomness.requestDraw(this.settings.requestParameters, this);
    } catch (error) {
      this.round.roundState = "open";
      throw error;
    }
    this.round.pendingRequestId = requestId;

    this.publish({ type: "requested_draw", requestId });
    return requestId;
  }

  fulfillRandomValue(caller: string, requestId: bigint, randomValue: bigint): void {
    if (caller !== this.settings.coordinatorId) {
      throw new OnlyCoordinatorCanFulfillError(caller, this.settings.coordinatorId);
    }
    if (this.round.roundState !== "calculating" || this.round.pendingRequestId !== requestId) {
      throw new DuplicateOrUnknownRequestError(requestId);
    }
    if (randomValue < 0n) {
      throw new RangeError(`Random value must be non-negative, got ${randomValue}.`);
    }

    const participants = this.round.participants;
    const index = Number(randomValue % BigInt(participants.length));
    const winner = participants[index];
    if (winner === undefined) {
      throw new Error(`No participant at index ${index} of ${participants.length}.`);
    }
    const amount = this.funds.heldBalance();

    const saved = copyRound(this.round);
    const staged: RaffleEvent[] = [];
    this.staged = staged;
    try {
      this.round.recentWinner = { participant: winner, amount, requestId, pickedAt: this.clock() };
      this.round.lastTimestamp = this.clock();
      this.round.participants = [];
      this.round.roundState = "open";
      delete this.round.pendingRequestId;
      this.publish({ type: "winner_picked", participant: winner, amount, requestId });

      const outcome = this.funds.transfer(winner, amount);
      if (!outcome.ok) {
        throw new TransferFailedError(winner, amount, outcome.reason);
      }
    } catch (error) {
      this.round = saved;
      this.staged = null;
      throw error;
    }

    this.staged = null;
    for (const event of staged) {
      this.emit(event);
    }
  }

  getRoundState(): RoundState {
    return this.round.roundState;
  }

  getEntranceFee(): bigint {
    return this.settings.entranceFee;
  }

  getInterval(): number {
    return this.settings.intervalMs;
  }

  getRequestParameters(): Readonly<DrawRequestParameters> {
    return this.settings.requestParameters;
  }

  getParticipant(index: number): string {
    const participant = this.round.participants[index];
    if (participant === undefined) {
      throw new RangeError(`No participant at index ${index}.`);
    }
    return participant;
  }

  getParticipants(): readonly string[] {
    return [...this.round.participants];
  }

  getParticipantCount(): number {
    return this.round.participants.length;
  }

  getLastTimestamp(): number {
    return this.round.lastTimestamp;
  }

  getRecentWinner(): WinnerRecord | undefined {
    return this.round.recentWinner ? { ...this.round.recentWinner } : undefined;
  }

  getPooledBalance(): bigint {
    return this.funds.heldBalance();
  }

  snapshot(): RaffleSnapshot {
    return copyRound(this.round);
  }

  private publish(event: RaffleEvent): void {
    if (this.staged) {
      this.staged.push(event);
      return;
    }
    this.emit(event);
  }

  // Listeners run after the state change is final; their failures are reported, not rethrown.
  private emit(event: RaffleEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        if (this.logger) {
          this.logger.error("raffle_listener_failed", { event: event.type, ...normalizeError(error) });
        } else {
          console.error("raffle_listener_failed", { event: event.type, ...normalizeError(error) });
        }
      }
    }
  }
}
