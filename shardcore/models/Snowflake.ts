//shardcore/models/Snowflake.ts

import { z } from "zod";

/** 64-bit entity id; the top 42 bits are milliseconds since PLATFORM_EPOCH. */
export type Snowflake = bigint;

export const PLATFORM_EPOCH = 1420070400000;

// Ids arrive as decimal strings; a few older payloads use plain numbers.
export const SnowflakeSchema = z
  .union([z.string().regex(/^\d+$/, "snowflake must be a decimal string"), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

export function parseSnowflake(value: string | number | bigint): Snowflake {
  if (typeof value === "bigint") return value;
  return SnowflakeSchema.parse(value);
}

/** Creation time (ms since unix epoch) encoded in the id. */
export function snowflakeTimestamp(id: Snowflake): number {
  return Number(id >> 22n) + PLATFORM_EPOCH;
}

export function snowflakeToString(id: Snowflake): string {
  return id.toString(10);
}
