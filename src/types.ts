export type RoundState = "open" | "calculating";

export interface DrawRequestParameters {
  keyHash: string;
  subscriptionId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: 1;
}

export interface RaffleSettings {
  entranceFee: bigint;
  intervalMs: number;
  requestParameters: DrawRequestParameters;
  coordinatorId: string;
}

export interface WinnerRecord {
  participant: string;
  amount: bigint;
  requestId: bigint;
  pickedAt: number;
}

export type RaffleEvent =
  | { type: "entered_raffle"; participant: string; stake: bigint }
  | { type: "requested_draw"; requestId: bigint }
  | { type: "winner_picked"; participant: string; amount: bigint; requestId: bigint };

export type RaffleListener = (event: RaffleEvent) => void;

export interface RaffleSnapshot {
  roundState: RoundState;
  participants: string[];
  lastTimestamp: number;
  pendingRequestId?: bigint;
  recentWinner?: WinnerRecord;
}

export interface VaultSnapshot {
  held: bigint;
  credits: Record<string, bigint>;
}

export interface PendingDrawRequest {
  requestId: bigint;
  consumerId: string;
  parameters: DrawRequestParameters;
  requestedAt: number;
  randomValue?: bigint;
}

export interface CoordinatorSnapshot {
  nextRequestId: bigint;
  pending: PendingDrawRequest[];
}
