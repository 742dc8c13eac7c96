import type { RoundState } from "./types";

export type RaffleErrorCode =
  | "InsufficientStake"
  | "RoundNotOpen"
  | "UpkeepNotNeeded"
  | "InvalidParticipant"
  | "DuplicateOrUnknownRequest"
  | "OnlyCoordinatorCanFulfill"
  | "TransferFailed";

export class RaffleError extends Error {
  readonly code: RaffleErrorCode;
  readonly status: number;
  readonly details: Record<string, unknown>;

  constructor(code: RaffleErrorCode, message: string, status: number, details: Record<string, unknown> = {}) {
    super(message);
    this.name = code;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class InsufficientStakeError extends RaffleError {
  constructor(stake: bigint, entranceFee: bigint) {
    super("InsufficientStake", `Stake ${stake} is below the entrance fee ${entranceFee}.`, 400, {
      stake,
      entranceFee,
    });
  }
}

export class RoundNotOpenError extends RaffleError {
  constructor() {
    super("RoundNotOpen", "The round is calculating a winner; entries are closed.", 409);
  }
}

export class InvalidParticipantError extends RaffleError {
  constructor(participant: string) {
    super("InvalidParticipant", "Participant identity must be a non-empty string.", 400, { participant });
  }
}

export class UpkeepNotNeededError extends RaffleError {
  readonly pooledBalance: bigint;
  readonly participantCount: number;
  readonly roundState: RoundState;

  constructor(pooledBalance: bigint, participantCount: number, roundState: RoundState) {
    super(
      "UpkeepNotNeeded",
      `Upkeep not needed (balance=${pooledBalance}, participants=${participantCount}, state=${roundState}).`,
      409,
      { pooledBalance, participantCount, roundState },
    );
    this.pooledBalance = pooledBalance;
    this.participantCount = participantCount;
    this.roundState = roundState;
  }
}

export class DuplicateOrUnknownRequestError extends RaffleError {
  constructor(requestId: bigint) {
    super("DuplicateOrUnknownRequest", `Request ${requestId} is unknown or already fulfilled.`, 404, {
      requestId,
    });
  }
}

export class OnlyCoordinatorCanFulfillError extends RaffleError {
  constructor(caller: string, coordinatorId: string) {
    super("OnlyCoordinatorCanFulfill", `Only ${coordinatorId} may deliver random values.`, 403, {
      caller,
      coordinatorId,
    });
  }
}

export class TransferFailedError extends RaffleError {
  constructor(recipient: string, amount: bigint, reason: string) {
    super("TransferFailed", `Transfer of ${amount} to ${recipient} failed: ${reason}`, 502, {
      recipient,
      amount,
      reason,
    });
  }
}

export function normalizeError(reason: unknown): { message: string; code?: string; stack?: string } {
  if (reason instanceof RaffleError) {
    return { message: reason.message, code: reason.code };
  }
  if (reason instanceof Error) {
    return { message: reason.message, ...(reason.stack ? { stack: reason.stack } : {}) };
  }
  return { message: String(reason) };
}
