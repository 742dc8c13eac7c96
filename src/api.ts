import crypto from "node:crypto";
import http from "node:http";

import type { AppConfig } from "./config";
import { normalizeError, RaffleError } from "./errors";
import type { AppLogger } from "./logger";
import type { RaffleService } from "./service";

type RateLimitState = { count: number; windowStart: number };
type Verification = { ok: true; userId: string } | { ok: false };

export type ApiConfig = Pick<
  AppConfig,
  | "apiUrl"
  | "apiSecret"
  | "apiPort"
  | "apiTokenTtlMs"
  | "apiRateLimitWindowMs"
  | "apiRateLimitMax"
  | "apiIpAllowlist"
  | "operatorIds"
>;

function buildSignature(userId: string, ts: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(`${userId}:${ts}`).digest("hex");
}

function verifySignatureWithTtl(params: URLSearchParams, secret: string, ttlMs: number, now: number): Verification {
  const userId = params.get("uid")?.trim() ?? "";
  const ts = params.get("ts")?.trim() ?? "";
  const sig = params.get("sig")?.trim() ?? "";
  if (!userId || !ts || !sig) {
    return { ok: false };
  }

  const tsNum = Number(ts);
  if (!Number.isFinite(tsNum) || Math.abs(now - tsNum) > ttlMs) {
    return { ok: false };
  }

  const expected = buildSignature(userId, ts, secret);
  const left = Buffer.from(sig, "hex");
  const right = Buffer.from(expected, "hex");
  if (left.length === 0 || left.length !== right.length) {
    return { ok: false };
  }

  if (!crypto.timingSafeEqual(left, right)) {
    return { ok: false };
  }

  return { ok: true, userId };
}

function normalizeIp(rawIp?: string): string {
  if (!rawIp) {
    return "";
  }
  const v = rawIp.trim();
  if (v.startsWith("::ffff:")) {
    return v.slice("::ffff:".length);
  }
  return v;
}

function isIpAllowed(ip: string, allowlist: Set<string>): boolean {
  if (allowlist.size === 0) {
    return true;
  }
  return allowlist.has(ip);
}

function hitRateLimit(
  state: Map<string, RateLimitState>,
  key: string,
  now: number,
  windowMs: number,
  maxRequests: number,
): boolean {
  for (const [entryKey, entry] of state) {
    if (now - entry.windowStart >= windowMs) {
      state.delete(entryKey);
    }
  }
  const current = state.get(key);
  if (!current || now - current.windowStart >= windowMs) {
    state.set(key, { count: 1, windowStart: now });
    return true;
  }
  if (current.count >= maxRequests) {
    return false;
  }
  state.set(key, { count: current.count + 1, windowStart: current.windowStart });
  return true;
}

function parseUint(raw: string | null): bigint | null {
  const value = raw?.trim() ?? "";
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return BigInt(value);
}

async function readPostBody(req: http.IncomingMessage): Promise<URLSearchParams> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return new URLSearchParams(Buffer.concat(chunks).toString("utf8"));
}

function encodeValue(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(body, encodeValue, 2));
}

function sendText(res: http.ServerResponse, status: number, text: string): void {
  res.writeHead(status, { "content-type": "text/plain; charset=utf-8" });
  res.end(text);
}

function buildStateReport(service: Pick<RaffleService, "raffle" | "coordinator">): Record<string, unknown> {
  const { raffle, coordinator } = service;
  return {
    roundState: raffle.getRoundState(),
    entranceFee: raffle.getEntranceFee(),
    intervalMs: raffle.getInterval(),
    participants: raffle.getParticipants(),
    participantCount: raffle.getParticipantCount(),
    pooledBalance: raffle.getPooledBalance(),
    lastTimestamp: raffle.getLastTimestamp(),
    recentWinner: raffle.getRecentWinner() ?? null,
    pendingRequestIds: coordinator.pendingRequestIds(),
  };
}

export function createApiServer(
  config: ApiConfig,
  service: Pick<RaffleService, "raffle" | "coordinator">,
  logger: AppLogger,
): http.Server | null {
  if (!config.apiUrl) {
    return null;
  }
  const basePath = new URL(config.apiUrl).pathname.replace(/\/$/, "") || "/raffle";
  const rateLimitState = new Map<string, RateLimitState>();
  const { raffle, coordinator } = service;

  const server = http.createServer(async (req, res) => {
    const method = req.method ?? "GET";
    const host = req.headers.host || "localhost";
    const requestUrl = new URL(req.url ?? "/", `http://${host}`);
    const pathName = requestUrl.pathname;
    const clientIp = normalizeIp(req.socket.remoteAddress);

    if (pathName === "/health") {
      sendText(res, 200, "ok");
      return;
    }

    if (
      pathName !== `${basePath}/state` &&
      pathName !== `${basePath}/upkeep` &&
      pathName !== `${basePath}/enter` &&
      pathName !== `${basePath}/fulfill`
    ) {
      sendText(res, 404, "Not found");
      return;
    }

    if (!isIpAllowed(clientIp, config.apiIpAllowlist)) {
      sendText(res, 403, "Forbidden");
      return;
    }

    const now = Date.now();
    if (!hitRateLimit(rateLimitState, `${clientIp}:${pathName}`, now, config.apiRateLimitWindowMs, config.apiRateLimitMax)) {
      res.writeHead(429, {
        "content-type": "text/plain; charset=utf-8",
        "retry-after": String(Math.ceil(config.apiRateLimitWindowMs / 1000)),
      });
      res.end("Too Many Requests");
      return;
    }

    const verification = verifySignatureWithTtl(requestUrl.searchParams, config.apiSecret, config.apiTokenTtlMs, now);
    if (!verification.ok) {
      sendText(res, 401, "Unauthorized");
      return;
    }
    const callerId = verification.userId;

    try {
      if (method === "GET" && pathName === `${basePath}/state`) {
        sendJson(res, 200, buildStateReport(service));
        return;
      }

      if (method === "GET" && pathName === `${basePath}/upkeep`) {
        sendJson(res, 200, { upkeepNeeded: raffle.checkUpkeep() });
        return;
      }

      if (method === "POST" && pathName === `${basePath}/enter`) {
        const body = await readPostBody(req);
        const stake = parseUint(body.get("stake"));
        if (stake === null) {
          sendJson(res, 400, { error: "InvalidStake", message: "stake must be a non-negative integer." });
          return;
        }
        raffle.enterRaffle(callerId, stake);
        sendJson(res, 200, { participant: callerId, participantCount: raffle.getParticipantCount() });
        return;
      }

      if (method === "POST" && !config.operatorIds.has(callerId)) {
        logger.warn("api_operator_denied", { callerId, path: pathName, ip: clientIp });
        sendText(res, 403, "Operator only");
        return;
      }

      if (method === "POST" && pathName === `${basePath}/upkeep`) {
        const requestId = raffle.performUpkeep();
        logger.info("api_upkeep_performed", { callerId, requestId });
        sendJson(res, 200, { requestId });
        return;
      }

      if (method === "POST" && pathName === `${basePath}/fulfill`) {
        const body = await readPostBody(req);
        const requestId = parseUint(body.get("requestId"));
        if (requestId === null) {
          sendJson(res, 400, { error: "InvalidRequestId", message: "requestId must be a non-negative integer." });
          return;
        }
        const randomValue = coordinator.fulfill(requestId);
        logger.info("api_fulfillment_retried", { callerId, requestId });
        sendJson(res, 200, { requestId, randomValue, recentWinner: raffle.getRecentWinner() ?? null });
        return;
      }
    } catch (error) {
      if (error instanceof RaffleError) {
        logger.warn("api_request_rejected", { callerId, path: pathName, code: error.code });
        sendJson(res, error.status, { error: error.code, message: error.message, details: error.details });
        return;
      }
      logger.error("api_request_failed", { callerId, path: pathName, ...normalizeError(error) });
      sendText(res, 500, "Internal Server Error");
      return;
    }

    sendText(res, 405, "Method Not Allowed");
  });

  server.listen(config.apiPort, "0.0.0.0", () => {
    logger.info("api_started", { url: config.apiUrl, bindPort: config.apiPort });
  });

  return server;
}

export const __apiTestables = {
  buildSignature,
  buildStateReport,
  hitRateLimit,
  isIpAllowed,
  normalizeIp,
  parseUint,
  verifySignatureWithTtl,
};
