import assert from "node:assert";
import fs from "node:fs";
import type http from "node:http";
import os from "node:os";
import path from "node:path";
import { after, describe, it } from "node:test";

import { __apiTestables, createApiServer, type ApiConfig } from "./api";
import { AppLogger } from "./logger";
import { RaffleRepository } from "./repository";
import { createRaffleService, type RaffleService } from "./service";

const SECRET = "test-secret";

function mkApiConfig(overrides: Partial<ApiConfig> = {}): ApiConfig {
  return {
    apiUrl: "http://127.0.0.1/raffle",
    apiSecret: SECRET,
    apiPort: 0,
    apiTokenTtlMs: 600_000,
    apiRateLimitWindowMs: 60_000,
    apiRateLimitMax: 120,
    apiIpAllowlist: new Set(),
    operatorIds: new Set(["op-1"]),
    ...overrides,
  };
}

function mkService(clock: { now: number }): { service: RaffleService; logger: AppLogger } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "raffle-api-server-"));
  const logger = new AppLogger({ logPath: path.join(dir, "raffle.log"), echo: false });
  const service = createRaffleService(
    {
      raffle: {
        entranceFee: 5n,
        intervalMs: 30_000,
        coordinatorId: "local-coordinator",
        requestParameters: {
          keyHash: `0x${"00".repeat(32)}`,
          subscriptionId: 0n,
          requestConfirmations: 3,
          callbackGasLimit: 500_000,
          numWords: 1,
        },
      },
      coordinatorFulfillDelayMs: 0,
      keeperCheckIntervalMs: 0,
    },
    logger,
    new RaffleRepository(path.join(dir, "raffle.json")),
    { clock: () => clock.now, generate: () => 9n },
  );
  return { service, logger };
}

function signed(userId: string): string {
  const ts = String(Date.now());
  const sig = __apiTestables.buildSignature(userId, ts, SECRET);
  return new URLSearchParams({ uid: userId, ts, sig }).toString();
}

async function getServerBaseUrl(server: http.Server): Promise<string> {
  const existing = server.address();
  if (existing && typeof existing !== "string") {
    return `http://127.0.0.1:${existing.port}`;
  }
  await new Promise<void>((resolve) => {
    server.once("listening", () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server address is not available.");
  }
  return `http://127.0.0.1:${address.port}`;
}

function startServer(config: ApiConfig, service: RaffleService, logger: AppLogger): http.Server {
  const server = createApiServer(config, service, logger);
  if (!server) {
    throw new Error("Server must be created for tests.");
  }
  return server;
}

async function post(url: string, body: Record<string, string>): Promise<Response> {
  return fetch(url, { method: "POST", body: new URLSearchParams(body) });
}

describe("raffle api endpoints", () => {
  const clock = { now: 1_000_000 };
  const { service, logger } = mkService(clock);
  const server = startServer(mkApiConfig(), service, logger);

  after(() => {
    server.close();
    service.stop();
  });

  it("responds to health endpoint", async () => {
    const url = await getServerBaseUrl(server);
    const response = await fetch(`${url}/health`);
    assert.strictEqual(response.status, 200);
    assert.strictEqual(await response.text(), "ok");
  });

  it("rejects unsigned state request", async () => {
    const url = await getServerBaseUrl(server);
    const response = await fetch(`${url}/raffle/state`);
    assert.strictEqual(response.status, 401);
  });

  it("enters the signed caller", async () => {
    const url = await getServerBaseUrl(server);
    const response = await post(`${url}/raffle/enter?${signed("alice")}`, { stake: "5" });
    assert.strictEqual(response.status, 200);
    assert.deepStrictEqual(await response.json(), { participant: "alice", participantCount: 1 });
  });

  it("maps an insufficient stake to 400", async () => {
    const url = await getServerBaseUrl(server);
    const response = await post(`${url}/raffle/enter?${signed("bob")}`, { stake: "4" });
    const payload = (await response.json()) as { error: string; details: Record<string, string> };
    assert.strictEqual(response.status, 400);
    assert.strictEqual(payload.error, "InsufficientStake");
    assert.deepStrictEqual(payload.details, { stake: "4", entranceFee: "5" });
  });

  it("rejects a stake that is not an integer", async () => {
    const url = await getServerBaseUrl(server);
    const response = await post(`${url}/raffle/enter?${signed("bob")}`, { stake: "five" });
    const payload = (await response.json()) as { error: string };
    assert.strictEqual(response.status, 400);
    assert.strictEqual(payload.error, "InvalidStake");
  });

  it("reserves draw triggers for operators", async () => {
    const url = await getServerBaseUrl(server);
    const response = await post(`${url}/raffle/upkeep?${signed("alice")}`, {});
    assert.strictEqual(response.status, 403);
  });

  it("returns the upkeep diagnostic before the interval elapses", async () => {
    const url = await getServerBaseUrl(server);
    const check = await fetch(`${url}/raffle/upkeep?${signed("alice")}`);
    assert.deepStrictEqual(await check.json(), { upkeepNeeded: false });

    const response = await post(`${url}/raffle/upkeep?${signed("op-1")}`, {});
    const payload = (await response.json()) as { error: string; details: Record<string, unknown> };
    assert.strictEqual(response.status, 409);
    assert.strictEqual(payload.error, "UpkeepNotNeeded");
    assert.deepStrictEqual(payload.details, { pooledBalance: "5", participantCount: 1, roundState: "open" });
  });

  it("triggers the draw and closes entries", async () => {
    clock.now += 30_000;
    const url = await getServerBaseUrl(server);
    const response = await post(`${url}/raffle/upkeep?${signed("op-1")}`, {});
    assert.strictEqual(response.status, 200);
    assert.deepStrictEqual(await response.json(), { requestId: "1" });

    const entry = await post(`${url}/raffle/enter?${signed("bob")}`, { stake: "5" });
    assert.strictEqual(entry.status, 409);
    assert.strictEqual(((await entry.json()) as { error: string }).error, "RoundNotOpen");

    const state = await fetch(`${url}/raffle/state?${signed("bob")}`);
    const payload = (await state.json()) as Record<string, unknown>;
    assert.strictEqual(payload.roundState, "calculating");
    assert.deepStrictEqual(payload.participants, ["alice"]);
    assert.deepStrictEqual(payload.pendingRequestIds, ["1"]);
    assert.strictEqual(payload.pooledBalance, "5");
  });

  it("lets an operator deliver the outstanding request once", async () => {
    const url = await getServerBaseUrl(server);
    const response = await post(`${url}/raffle/fulfill?${signed("op-1")}`, { requestId: "1" });
    assert.strictEqual(response.status, 200);
    assert.deepStrictEqual(await response.json(), {
      requestId: "1",
      randomValue: "9",
      recentWinner: { participant: "alice", amount: "5", requestId: "1", pickedAt: 1_030_000 },
    });
    assert.strictEqual(service.raffle.getRoundState(), "open");

    const again = await post(`${url}/raffle/fulfill?${signed("op-1")}`, { requestId: "1" });
    assert.strictEqual(again.status, 404);
    assert.strictEqual(((await again.json()) as { error: string }).error, "DuplicateOrUnknownRequest");
  });
});

describe("raffle api hardening", () => {
  it("returns 403 when ip is not in allowlist", async () => {
    const { service, logger } = mkService({ now: 0 });
    const server = startServer(mkApiConfig({ apiIpAllowlist: new Set(["10.10.10.10"]) }), service, logger);
    try {
      const url = await getServerBaseUrl(server);
      const response = await fetch(`${url}/raffle/state?${signed("alice")}`);
      assert.strictEqual(response.status, 403);
    } finally {
      server.close();
      service.stop();
    }
  });

  it("returns 429 when rate limit exceeded", async () => {
    const { service, logger } = mkService({ now: 0 });
    const server = startServer(mkApiConfig({ apiRateLimitMax: 1, apiRateLimitWindowMs: 120_000 }), service, logger);
    try {
      const url = await getServerBaseUrl(server);
      const first = await fetch(`${url}/raffle/state?${signed("alice")}`);
      const second = await fetch(`${url}/raffle/state?${signed("alice")}`);
      assert.strictEqual(first.status, 200);
      assert.strictEqual(second.status, 429);
      assert.strictEqual(second.headers.get("retry-after"), "120");
    } finally {
      server.close();
      service.stop();
    }
  });

  it("is not created without an api url", () => {
    const { service, logger } = mkService({ now: 0 });
    const config = mkApiConfig();
    delete config.apiUrl;
    assert.strictEqual(createApiServer(config, service, logger), null);
  });
});
