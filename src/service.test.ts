import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";

import { AppLogger } from "./logger";
import { RaffleRepository } from "./repository";
import { createRaffleService } from "./service";

const CONFIG = {
  raffle: {
    entranceFee: 5n,
    intervalMs: 10_000,
    coordinatorId: "local-coordinator",
    requestParameters: {
      keyHash: `0x${"00".repeat(32)}`,
      subscriptionId: 0n,
      requestConfirmations: 3,
      callbackGasLimit: 500_000,
      numWords: 1 as const,
    },
  },
  coordinatorFulfillDelayMs: 0,
  keeperCheckIntervalMs: 0,
};

function mkEnv() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "raffle-service-"));
  const storagePath = path.join(dir, "raffle.json");
  const logPath = path.join(dir, "raffle.log");
  return {
    storagePath,
    logPath,
    logger: new AppLogger({ logPath, echo: false }),
    clock: { now: 1_000_000 },
  };
}

function readEvents(logPath: string): string[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => (JSON.parse(line) as { event: string }).event);
}

describe("createRaffleService", () => {
  it("persists every committed step and logs raffle events", () => {
    const env = mkEnv();
    const repository = new RaffleRepository(env.storagePath);
    const service = createRaffleService(CONFIG, env.logger, repository, { clock: () => env.clock.now });

    assert.strictEqual(repository.load()?.raffle.roundState, "open");

    service.raffle.enterRaffle("alice", 5n);
    service.raffle.enterRaffle("bob", 7n);
    assert.deepStrictEqual(repository.load()?.raffle.participants, ["alice", "bob"]);
    assert.strictEqual(repository.load()?.vault.held, 12n);

    env.clock.now += 10_000;
    const requestId = service.raffle.performUpkeep();
    assert.strictEqual(repository.load()?.raffle.roundState, "calculating");
    assert.deepStrictEqual(
      repository.load()?.coordinator.pending.map((request) => request.requestId),
      [requestId],
    );

    service.coordinator.fulfill(requestId, 3n);
    const stored = repository.load();
    assert.strictEqual(stored?.raffle.roundState, "open");
    assert.deepStrictEqual(stored?.raffle.recentWinner, {
      participant: "bob",
      amount: 12n,
      requestId: 1n,
      pickedAt: 1_010_000,
    });
    assert.deepStrictEqual(stored?.vault, { held: 0n, credits: { bob: 12n } });
    assert.deepStrictEqual(stored?.coordinator.pending, []);

    assert.deepStrictEqual(readEvents(env.logPath), [
      "raffle_entered",
      "raffle_entered",
      "draw_request_received",
      "draw_requested",
      "winner_picked",
      "draw_request_fulfilled",
    ]);
    service.stop();
  });

  it("resumes a calculating round after a restart", () => {
    const env = mkEnv();
    const first = createRaffleService(CONFIG, env.logger, new RaffleRepository(env.storagePath), {
      clock: () => env.clock.now,
    });
    first.raffle.enterRaffle("alice", 5n);
    first.raffle.enterRaffle("bob", 5n);
    env.clock.now += 10_000;
    const requestId = first.raffle.performUpkeep();
    first.stop();

    const second = createRaffleService(CONFIG, env.logger, new RaffleRepository(env.storagePath), {
      clock: () => env.clock.now,
    });
    assert.strictEqual(second.raffle.getRoundState(), "calculating");
    assert.deepStrictEqual(second.raffle.getParticipants(), ["alice", "bob"]);
    assert.strictEqual(second.raffle.getLastTimestamp(), 1_000_000);

    second.coordinator.fulfill(requestId, 2n);
    assert.strictEqual(second.raffle.getRecentWinner()?.participant, "alice");
    assert.strictEqual(second.vault.creditedTo("alice"), 10n);
    second.stop();
  });
});
