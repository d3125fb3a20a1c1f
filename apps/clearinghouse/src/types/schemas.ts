/**
 * Clearinghouse Data Contracts (Zod Schemas)
 *
 * - MarketsConfig: venue bootstrap file (tokens, seed balances, markets)
 * - ReplayOperation: one line of a JSON-lines operation log
 *
 * Prices, sizes and margins are decimal strings parsed to 1e18 bigints.
 * Ledger amounts are written in whole tokens and converted with the token's
 * decimals when the venue is built, except `amountUnits`, which is already in
 * native units.
 */

import { parseDecimal } from "@perp-clearing/core";
import { z } from "zod";

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

/** Signed decimal string → 1e18 bigint */
export const DecimalSchema = z.string().transform((value, ctx) => {
  const parsed = parseDecimal(value);
  if (parsed.isErr()) {
    ctx.addIssue({ code: "custom", message: parsed.error.message });
    return z.NEVER;
  }
  return parsed.value;
});

/** Non-negative decimal string → 1e18 bigint */
export const AmountSchema = DecimalSchema.refine(value => value >= 0n, { message: "must not be negative" });

/** Whole-token decimal kept as a string until the token's decimals are known */
export const TokenAmountSchema = z.string().regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal");

/** Integer string in native token units */
export const NativeUnitsSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform(value => BigInt(value));

export const BpsSchema = z.number().int().min(0).max(10_000);

const IdSchema = z.string().min(1);

// ─────────────────────────────────────────────────────────────────────────────
// Markets Config
// ─────────────────────────────────────────────────────────────────────────────

export const TokenSchema = z.object({
  token: IdSchema,
  decimals: z.number().int().min(0).max(36),
  /** Collateral valuation price */
  price: AmountSchema.default(1_000_000_000_000_000_000n),
  haircutBps: BpsSchema.default(0),
});

export const VammSchema = z.object({
  price: AmountSchema,
  baseReserve: AmountSchema,
  feeBps: BpsSchema,
  frMaxBpsPerHour: BpsSchema,
  kFunding: AmountSchema,
  observationCardinality: z.number().int().positive(),
  minReserveBase: AmountSchema.default(0n),
  minReserveQuote: AmountSchema.default(0n),
  fundingTwapWindowSec: z.number().int().min(0),
});

export const RiskSchema = z.object({
  imrBps: BpsSchema,
  mmrBps: BpsSchema,
  liquidationPenaltyBps: BpsSchema,
  /** 0 = uncapped */
  penaltyCap: AmountSchema.default(0n),
  maxPositionSize: AmountSchema.default(0n),
  minPositionSize: AmountSchema.default(0n),
  liquidatorShareBps: BpsSchema,
});

export const MarketSchema = z.object({
  marketId: IdSchema,
  baseToken: IdSchema,
  quoteToken: IdSchema,
  baseDecimals: z.number().int().min(0).max(36).default(18),
  /** Clearing fee charged on trade notional */
  clearingFeeBps: BpsSchema,
  /** Initial index (oracle) price */
  indexPrice: AmountSchema,
  paused: z.boolean().default(false),
  vamm: VammSchema,
  risk: RiskSchema,
});

export const SeedBalanceSchema = z.object({
  account: IdSchema,
  token: IdSchema,
  amount: TokenAmountSchema,
});

export const MarketsConfigSchema = z
  .object({
    /** Holder of every admin role */
    admin: IdSchema,
    insuranceAccount: IdSchema,
    feeRecipient: IdSchema,
    genesisTs: z.number().int().positive(),
    tokens: z.array(TokenSchema).min(1),
    seedBalances: z.array(SeedBalanceSchema).default([]),
    markets: z.array(MarketSchema).min(1),
  })
  .refine(config => new Set(config.markets.map(m => m.marketId)).size === config.markets.length, {
    message: "marketId must be unique",
  });

export type TokenDefinition = z.infer<typeof TokenSchema>;
export type MarketDefinition = z.infer<typeof MarketSchema>;
export type MarketsConfig = z.infer<typeof MarketsConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Replay Operations
// ─────────────────────────────────────────────────────────────────────────────

const accountOp = <const Op extends string>(op: Op) => z.object({ op: z.literal(op), account: IdSchema });

export const ReplayOperationSchema = z.discriminatedUnion("op", [
  accountOp("deposit").extend({ token: IdSchema, amountUnits: NativeUnitsSchema }),
  accountOp("withdraw").extend({ token: IdSchema, amountUnits: NativeUnitsSchema }),
  accountOp("openPosition").extend({
    marketId: IdSchema,
    direction: z.enum(["long", "short"]),
    size: AmountSchema,
    /** Worst acceptable average price; omitted = no limit */
    priceLimit: AmountSchema.default(0n),
  }),
  accountOp("closePosition").extend({
    marketId: IdSchema,
    size: AmountSchema,
    priceLimit: AmountSchema.default(0n),
  }),
  z.object({
    op: z.literal("liquidate"),
    liquidator: IdSchema,
    account: IdSchema,
    marketId: IdSchema,
    size: AmountSchema,
  }),
  accountOp("addMargin").extend({ marketId: IdSchema, amount: AmountSchema }),
  accountOp("removeMargin").extend({ marketId: IdSchema, amount: AmountSchema }),
  accountOp("settleFunding").extend({ marketId: IdSchema.optional() }),
  z.object({ op: z.literal("pokeFunding"), marketId: IdSchema }),
  z.object({ op: z.literal("pauseSwaps"), caller: IdSchema, marketId: IdSchema }),
  z.object({ op: z.literal("unpauseSwaps"), caller: IdSchema, marketId: IdSchema }),
  z.object({ op: z.literal("setFeeBps"), caller: IdSchema, marketId: IdSchema, feeBps: BpsSchema }),
  z.object({
    op: z.literal("resetReserves"),
    caller: IdSchema,
    marketId: IdSchema,
    price: AmountSchema,
    baseReserve: AmountSchema,
  }),
  z.object({ op: z.literal("advanceTime"), seconds: z.number().int().positive() }),
  z.object({ op: z.literal("setIndexPrice"), marketId: IdSchema, price: AmountSchema }),
  z.object({ op: z.literal("failIndexPrice"), marketId: IdSchema, reason: z.string().default("feed down") }),
]);

export type ReplayOperation = z.infer<typeof ReplayOperationSchema>;
