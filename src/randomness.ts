import crypto from "node:crypto";

import { DuplicateOrUnknownRequestError, normalizeError } from "./errors";
import type { AppLogger } from "./logger";
import type { CoordinatorSnapshot, DrawRequestParameters, PendingDrawRequest } from "./types";

export interface RandomnessConsumer {
  readonly consumerId: string;
  fulfillRandomValue(caller: string, requestId: bigint, randomValue: bigint): void;
}

export interface RandomnessClient {
  requestDraw(parameters: Readonly<DrawRequestParameters>, consumer: RandomnessConsumer): bigint;
}

export type CoordinatorOptions = {
  id: string;
  fulfillDelayMs?: number;
  logger?: AppLogger;
  clock?: () => number;
  generate?: () => bigint;
  initial?: CoordinatorSnapshot;
};

export function randomUint256(): bigint {
  return BigInt(`0x${crypto.randomBytes(32).toString("hex")}`);
}

function copyRequest(request: PendingDrawRequest): PendingDrawRequest {
  return { ...request, parameters: { ...request.parameters } };
}

/**
 * In-process randomness oracle. Holds the request correlation state: each id is delivered
 * at most once, and a delivery whose consumer throws puts the request back so it can be
 * retried with the same value.
 */
export class LocalRandomnessCoordinator implements RandomnessClient {
  readonly id: string;
  private readonly fulfillDelayMs: number | undefined;
  private readonly logger: AppLogger | undefined;
  private readonly clock: () => number;
  private readonly generate: () => bigint;
  private nextRequestId: bigint;
  private readonly pending = new Map<bigint, PendingDrawRequest>();
  private readonly consumers = new Map<string, RandomnessConsumer>();
  private readonly timers = new Map<bigint, NodeJS.Timeout>();
  private stopped = false;

  constructor(options: CoordinatorOptions) {
    this.id = options.id;
    this.fulfillDelayMs = options.fulfillDelayMs;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.generate = options.generate ?? randomUint256;
    this.nextRequestId = options.initial?.nextRequestId ?? 1n;
    for (const request of options.initial?.pending ?? []) {
      this.pending.set(request.requestId, copyRequest(request));
    }
  }

  attach(consumer: RandomnessConsumer): void {
    this.consumers.set(consumer.consumerId, consumer);
  }

  requestDraw(parameters: Readonly<DrawRequestParameters>, consumer: RandomnessConsumer): bigint {
    const requestId = this.nextRequestId;
    this.nextRequestId += 1n;
    this.attach(consumer);
    this.pending.set(requestId, {
      requestId,
      consumerId: consumer.consumerId,
      parameters: { ...parameters },
      requestedAt: this.clock(),
    });
    this.logger?.info("draw_request_received", { requestId, consumerId: consumer.consumerId });
    this.schedule(requestId);
    return requestId;
  }

  /** Delivers a value for an outstanding request and returns the value delivered. */
  fulfill(requestId: bigint, randomValue?: bigint): bigint {
    const request = this.pending.get(requestId);
    if (!request) {
      throw new DuplicateOrUnknownRequestError(requestId);
    }
    const consumer = this.consumers.get(request.consumerId);
    if (!consumer) {
      throw new Error(`No consumer "${request.consumerId}" attached for request ${requestId}.`);
    }

    const value = randomValue ?? request.randomValue ?? this.generate();
    request.randomValue = value;
    this.clearTimer(requestId);
    // Taken out while the callback runs so a re-entrant delivery of the same id is rejected.
    this.pending.delete(requestId);
    try {
      consumer.fulfillRandomValue(this.id, requestId, value);
    } catch (error) {
      if (error instanceof DuplicateOrUnknownRequestError) {
        this.logger?.warn("draw_request_dropped", { requestId, consumerId: request.consumerId });
        throw error;
      }
      this.pending.set(requestId, request);
      this.schedule(requestId);
      throw error;
    }
    this.logger?.info("draw_request_fulfilled", { requestId, randomValue: value });
    return value;
  }

  /** Schedules automatic delivery for requests restored from storage. */
  resume(): void {
    for (const requestId of this.pending.keys()) {
      if (!this.timers.has(requestId)) {
        this.schedule(requestId);
      }
    }
  }

  pendingRequestIds(): bigint[] {
    return [...this.pending.keys()];
  }

  snapshot(): CoordinatorSnapshot {
    return {
      nextRequestId: this.nextRequestId,
      pending: [...this.pending.values()].map(copyRequest),
    };
  }

  stop(): void {
    this.stopped = true;
    for (const requestId of [...this.timers.keys()]) {
      this.clearTimer(requestId);
    }
  }

  private schedule(requestId: bigint): void {
    if (this.fulfillDelayMs === undefined || this.stopped) {
      return;
    }
    this.clearTimer(requestId);
    const timer = setTimeout(() => {
      this.timers.delete(requestId);
      this.autoFulfill(requestId);
    }, this.fulfillDelayMs);
    this.timers.set(requestId, timer);
  }

  private autoFulfill(requestId: bigint): void {
    try {
      this.fulfill(requestId);
    } catch (error) {
      this.logger?.error("draw_fulfillment_failed", {
        requestId,
        willRetry: this.timers.has(requestId),
        ...normalizeError(error),
      });
    }
  }

  private clearTimer(requestId: bigint): void {
    const timer = this.timers.get(requestId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(requestId);
    }
  }
}
