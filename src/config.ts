import { z } from "zod";

import type { RaffleSettings } from "./types";

const digits = (name: string) => z.string().trim().regex(/^\d+$/, `${name} must be a non-negative integer`);

const EnvSchema = z
  .object({
    RAFFLE_ENTRANCE_FEE: digits("RAFFLE_ENTRANCE_FEE")
      .default("10000000000000000")
      .refine((value) => !/^\d+$/.test(value) || BigInt(value) > 0n, "RAFFLE_ENTRANCE_FEE must be positive"),
    RAFFLE_INTERVAL_SECONDS: z.coerce.number().min(0).default(30),
    DRAW_KEY_HASH: z
      .string()
      .regex(/^0x[0-9a-fA-F]{64}$/, "DRAW_KEY_HASH must be a 32-byte hex string")
      .default(`0x${"0".repeat(64)}`),
    DRAW_SUBSCRIPTION_ID: digits("DRAW_SUBSCRIPTION_ID").default("0"),
    DRAW_REQUEST_CONFIRMATIONS: z.coerce.number().int().min(1).max(200).default(3),
    DRAW_CALLBACK_GAS_LIMIT: z.coerce.number().int().min(1).default(500_000),
    COORDINATOR_ID: z.string().trim().min(1).default("local-coordinator"),
    COORDINATOR_FULFILL_DELAY_MS: z.coerce.number().int().min(0).default(2000),
    KEEPER_CHECK_INTERVAL_MS: z.coerce.number().int().min(0).default(5000),
    STORAGE_PATH: z.string().optional().default("data/raffle.json"),
    LOG_PATH: z.string().optional().default("data/raffle.log"),
    API_URL: z.string().optional().default(""),
    API_SECRET: z.string().optional().default(""),
    API_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
    API_TOKEN_TTL_MS: z.coerce.number().int().min(10_000).default(10 * 60 * 1000),
    API_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1_000).default(60_000),
    API_RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(120),
    API_IP_ALLOWLIST: z.string().optional().default(""),
    OPERATOR_IDS: z.string().optional().default(""),
  })
  .superRefine((env, ctx) => {
    if (env.API_URL.trim() && env.API_SECRET.trim().length < 8) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["API_SECRET"],
        message: "API_SECRET of at least 8 characters is required when API_URL is set",
      });
    }
  });

export type AppConfig = {
  raffle: RaffleSettings;
  coordinatorFulfillDelayMs: number;
  keeperCheckIntervalMs: number;
  storagePath: string;
  logPath: string;
  apiUrl?: string;
  apiSecret: string;
  apiPort: number;
  apiTokenTtlMs: number;
  apiRateLimitWindowMs: number;
  apiRateLimitMax: number;
  apiIpAllowlist: Set<string>;
  operatorIds: Set<string>;
};

function parseList(raw: string): Set<string> {
  return new Set(
    raw
      .split(",")
      .map((value) => value.trim())
      .filter(Boolean),
  );
}

export function loadConfig(): AppConfig {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`,
    );
  }

  const env = parsed.data;
  const apiUrl = env.API_URL.trim() || undefined;

  return {
    raffle: {
      entranceFee: BigInt(env.RAFFLE_ENTRANCE_FEE),
      intervalMs: env.RAFFLE_INTERVAL_SECONDS * 1000,
      requestParameters: {
        keyHash: env.DRAW_KEY_HASH,
        subscriptionId: BigInt(env.DRAW_SUBSCRIPTION_ID),
        requestConfirmations: env.DRAW_REQUEST_CONFIRMATIONS,
        callbackGasLimit: env.DRAW_CALLBACK_GAS_LIMIT,
        numWords: 1,
      },
      coordinatorId: env.COORDINATOR_ID,
    },
    coordinatorFulfillDelayMs: env.COORDINATOR_FULFILL_DELAY_MS,
    keeperCheckIntervalMs: env.KEEPER_CHECK_INTERVAL_MS,
    storagePath: env.STORAGE_PATH,
    logPath: env.LOG_PATH,
    apiSecret: env.API_SECRET.trim(),
    apiPort: env.API_PORT,
    apiTokenTtlMs: env.API_TOKEN_TTL_MS,
    apiRateLimitWindowMs: env.API_RATE_LIMIT_WINDOW_MS,
    apiRateLimitMax: env.API_RATE_LIMIT_MAX,
    apiIpAllowlist: parseList(env.API_IP_ALLOWLIST),
    operatorIds: parseList(env.OPERATOR_IDS),
    ...(apiUrl ? { apiUrl } : {}),
  };
}
