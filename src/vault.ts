import type { VaultSnapshot } from "./types";

export type TransferOutcome = { ok: true } | { ok: false; reason: string };

export interface FundTransfer {
  deposit(from: string, amount: bigint): void;
  heldBalance(): bigint;
  transfer(to: string, amount: bigint): TransferOutcome;
}

/**
 * Runs when a recipient is paid. Returning false (or throwing) refuses the payment and
 * reverts the whole transfer, including anything the hook did to the ledger meanwhile.
 */
export type ReceiveHook = (amount: bigint) => boolean | void;

type Checkpoint = {
  held: bigint;
  credits: Map<string, bigint>;
};

export class PrizeVault implements FundTransfer {
  private held: bigint;
  private readonly credits: Map<string, bigint>;
  private readonly hooks = new Map<string, ReceiveHook>();

  constructor(initial?: VaultSnapshot) {
    this.held = initial?.held ?? 0n;
    this.credits = new Map(Object.entries(initial?.credits ?? {}));
  }

  deposit(from: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new RangeError(`Deposit from ${from} must be positive, got ${amount}.`);
    }
    this.held += amount;
  }

  heldBalance(): bigint {
    return this.held;
  }

  creditedTo(recipient: string): bigint {
    return this.credits.get(recipient) ?? 0n;
  }

  onReceive(recipient: string, hook: ReceiveHook): () => void {
    this.hooks.set(recipient, hook);
    return () => {
      if (this.hooks.get(recipient) === hook) {
        this.hooks.delete(recipient);
      }
    };
  }

  transfer(to: string, amount: bigint): TransferOutcome {
    if (amount > this.held) {
      return { ok: false, reason: `insufficient held balance ${this.held}` };
    }

    const checkpoint = this.checkpoint();
    this.held -= amount;
    this.credits.set(to, this.creditedTo(to) + amount);

    const hook = this.hooks.get(to);
    if (!hook) {
      return { ok: true };
    }

    try {
      if (hook(amount) === false) {
        this.restore(checkpoint);
        return { ok: false, reason: "recipient refused payment" };
      }
    } catch (error) {
      this.restore(checkpoint);
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
    return { ok: true };
  }

  snapshot(): VaultSnapshot {
    return { held: this.held, credits: Object.fromEntries(this.credits) };
  }

  private checkpoint(): Checkpoint {
    return { held: this.held, credits: new Map(this.credits) };
  }

  private restore(checkpoint: Checkpoint): void {
    this.held = checkpoint.held;
    this.credits.clear();
    for (const [recipient, amount] of checkpoint.credits) {
      this.credits.set(recipient, amount);
    }
  }
}
