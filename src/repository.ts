import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import type { CoordinatorSnapshot, RaffleSnapshot, VaultSnapshot } from "./types";

export type StoredState = {
  raffle: RaffleSnapshot;
  vault: VaultSnapshot;
  coordinator: CoordinatorSnapshot;
};

const BigIntString = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => BigInt(value));

const StoredStateSchema = z.object({
  raffle: z
    .object({
      roundState: z.enum(["open", "calculating"]),
      participants: z.array(z.string()),
      lastTimestamp: z.number(),
      pendingRequestId: BigIntString.optional(),
      recentWinner: z
        .object({
          participant: z.string(),
          amount: BigIntString,
          requestId: BigIntString,
          pickedAt: z.number(),
        })
        .optional(),
    })
    .superRefine((raffle, ctx) => {
      if (raffle.roundState !== "calculating") {
        return;
      }
      if (raffle.participants.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["participants"], message: "must not be empty while calculating" });
      }
      if (raffle.pendingRequestId === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["pendingRequestId"], message: "is required while calculating" });
      }
    }),
  vault: z.object({
    held: BigIntString,
    credits: z.record(BigIntString),
  }),
  coordinator: z.object({
    nextRequestId: BigIntString,
    pending: z.array(
      z.object({
        requestId: BigIntString,
        consumerId: z.string(),
        parameters: z.object({
          keyHash: z.string(),
          subscriptionId: BigIntString,
          requestConfirmations: z.number().int(),
          callbackGasLimit: z.number().int(),
          numWords: z.literal(1),
        }),
        requestedAt: z.number(),
        randomValue: BigIntString.optional(),
      }),
    ),
  }),
});

function encodeValue(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/** Keeps the single live snapshot of the raffle; no round history is retained. */
export class RaffleRepository {
  private readonly storagePath: string;

  constructor(storagePath: string) {
    this.storagePath = storagePath;
    fs.mkdirSync(path.dirname(this.storagePath), { recursive: true });
  }

  load(): StoredState | undefined {
    if (!fs.existsSync(this.storagePath)) {
      return undefined;
    }
    const raw = fs.readFileSync(this.storagePath, "utf8");
    const parsed = StoredStateSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(
        `Invalid raffle storage at ${this.storagePath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join(", ")}`,
      );
    }
    const { raffle, vault, coordinator } = parsed.data;
    return {
      raffle: {
        roundState: raffle.roundState,
        participants: raffle.participants,
        lastTimestamp: raffle.lastTimestamp,
        ...(raffle.pendingRequestId !== undefined ? { pendingRequestId: raffle.pendingRequestId } : {}),
        ...(raffle.recentWinner ? { recentWinner: raffle.recentWinner } : {}),
      },
      vault,
      coordinator: {
        nextRequestId: coordinator.nextRequestId,
        pending: coordinator.pending.map((request) => ({
          requestId: request.requestId,
          consumerId: request.consumerId,
          parameters: request.parameters,
          requestedAt: request.requestedAt,
          ...(request.randomValue !== undefined ? { randomValue: request.randomValue } : {}),
        })),
      },
    };
  }

  save(state: StoredState): void {
    const tmpPath = `${this.storagePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(state, encodeValue, 2));
    fs.renameSync(tmpPath, this.storagePath);
  }
}
