//shardcore/core/errors.ts

//////////////////////////
// Base
//////////////////////////

export class ShardlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

//////////////////////////
// Primitives
//////////////////////////

export class ChannelClosedError extends ShardlineError {
  constructor() {
    super("channel is closed");
  }
}

/** A wait was abandoned because its AbortSignal fired. */
export class CancelledError extends ShardlineError {
  constructor(reason?: unknown) {
    super(
      reason instanceof Error ? `cancelled: ${reason.message}` : "cancelled",
      reason === undefined ? undefined : { cause: reason },
    );
  }
}

export function isCancellation(err: unknown): boolean {
  return err instanceof CancelledError || (err instanceof Error && err.name === "AbortError");
}

//////////////////////////
// Gateway
//////////////////////////

export class ShardAddressError extends ShardlineError {
  constructor(
    readonly shardId: number,
    readonly shardCount: number,
  ) {
    super(`no shard ${shardId} (shard count is ${shardCount})`);
  }
}

export class GatewayClosedError extends ShardlineError {
  constructor(
    readonly code: number,
    readonly reason: string,
  ) {
    super(`gateway closed with code ${code}${reason ? ` (${reason})` : ""}`);
  }
}

export class ZombieConnectionError extends GatewayClosedError {
  constructor() {
    super(4100, "heartbeat ack not received");
  }
}

export class MalformedPayloadError extends ShardlineError {}

/** The client left a guild before its member list finished arriving. */
export class GuildLeftError extends ShardlineError {
  constructor(readonly guildId: bigint) {
    super(`left guild ${guildId} before it was fully chunked`);
  }
}

/** Errors of this family end the shard; retrying cannot succeed. */
export class FatalGatewayError extends ShardlineError {
  constructor(
    message: string,
    readonly shardId: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class AuthenticationError extends FatalGatewayError {}

export class ShardingError extends FatalGatewayError {}

export class DisallowedIntentsError extends FatalGatewayError {}

export class RetryBudgetExhaustedError extends FatalGatewayError {
  constructor(
    shardId: number,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(`shard ${shardId} gave up after ${attempts} failed connection attempts`, shardId, { cause });
  }
}

//////////////////////////
// HTTP
//////////////////////////

export class HttpError extends ShardlineError {
  constructor(
    readonly status: number,
    readonly route: string,
    readonly body: unknown,
  ) {
    super(`HTTP ${status} on ${route}`);
  }
}

export class RateLimitedError extends HttpError {
  constructor(
    route: string,
    body: unknown,
    readonly retryAfterMs: number,
    readonly global: boolean,
  ) {
    super(429, route, body);
  }
}

//////////////////////////
// Models
//////////////////////////

export class UnsupportedOperationError extends ShardlineError {}
