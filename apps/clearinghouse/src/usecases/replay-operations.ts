/**
 * Replay Operations Use Case
 *
 * - Parse a JSON-lines operation log (blank lines and `#` comments skipped)
 * - Submit each operation through the ClearingHouse in file order
 * - Clock and index price operations drive the in-memory collaborators
 * - Rejections are reported per line and never stop the replay
 */

import type { ManualClock, StaticPriceSource } from "@perp-clearing/adapters";
import { formatDecimal, type MarketId } from "@perp-clearing/core";
import { clearingError, type ClearingEngine, type ClearingError } from "@perp-clearing/engine";
import { logger, type Logger } from "@perp-clearing/utils";
import { err, ok, Result } from "neverthrow";

import type { ClearingHouse } from "../services/clearing-house";
import { ReplayOperationSchema, type ReplayOperation } from "../types/schemas";

export interface ReplayLine {
  line: number;
  operation: ReplayOperation;
}

export type ReplayParseError = { type: "REPLAY_PARSE_ERROR"; line: number; message: string };

export interface ReplayEnvironment {
  house: ClearingHouse;
  clock: ManualClock;
  oracles: ReadonlyMap<MarketId, StaticPriceSource>;
}

export interface ReplayOutcome {
  line: number;
  op: ReplayOperation["op"];
  ok: boolean;
  /** Summary of the result, or the error code and message */
  detail: string;
}

export interface ReplaySummary {
  applied: number;
  rejected: number;
  /** Rejection count per error code */
  rejections: Record<string, number>;
  outcomes: ReplayOutcome[];
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  error => (error instanceof Error ? error.message : String(error)),
);

export function parseReplay(text: string): Result<ReplayLine[], ReplayParseError> {
  const lines: ReplayLine[] = [];
  const rows = text.split(/\r?\n/);

  for (const [index, raw] of rows.entries()) {
    const line = index + 1;
    const trimmed = raw.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const json = parseJson(trimmed);
    if (json.isErr()) {
      return err({ type: "REPLAY_PARSE_ERROR", line, message: `invalid JSON: ${json.error}` });
    }

    const parsed = ReplayOperationSchema.safeParse(json.value);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => `${issue.path.map(String).join(".")}: ${issue.message}`).join("; ");
      return err({ type: "REPLAY_PARSE_ERROR", line, message });
    }
    lines.push({ line, operation: parsed.data });
  }

  return ok(lines);
}

export async function runReplay(
  env: ReplayEnvironment,
  lines: readonly ReplayLine[],
  log: Logger = logger.child({ usecase: "replay" }),
): Promise<ReplaySummary> {
  const summary: ReplaySummary = { applied: 0, rejected: 0, rejections: {}, outcomes: [] };

  for (const { line, operation } of lines) {
    const result = await env.house.submit(operation.op, engine => execute(env, engine, operation));

    if (result.isOk()) {
      summary.applied++;
      summary.outcomes.push({ line, op: operation.op, ok: true, detail: result.value });
      log.debug("replayed", { line, op: operation.op, detail: result.value });
    } else {
      const { type, message } = result.error;
      summary.rejected++;
      summary.rejections[type] = (summary.rejections[type] ?? 0) + 1;
      summary.outcomes.push({ line, op: operation.op, ok: false, detail: `${type}: ${message}` });
      log.info("replay operation rejected", { line, op: operation.op, error: type, category: result.error.category });
    }
  }

  log.info("replay finished", { applied: summary.applied, rejected: summary.rejected });
  return summary;
}

function oracleFor(env: ReplayEnvironment, marketId: MarketId): Result<StaticPriceSource, ClearingError> {
  const oracle = env.oracles.get(marketId);
  if (!oracle) return err(clearingError("UNKNOWN_MARKET", `no index price source for ${marketId}`));
  return ok(oracle);
}

/**
 * Run one operation and describe its result
 */
function execute(env: ReplayEnvironment, engine: ClearingEngine, op: ReplayOperation): Result<string, ClearingError> {
  switch (op.op) {
    case "deposit":
      return engine.deposit(op.account, op.token, op.amountUnits).map(() => `${op.amountUnits.toString()} ${op.token}`);
    case "withdraw":
      return engine.withdraw(op.account, op.token, op.amountUnits).map(() => `${op.amountUnits.toString()} ${op.token}`);
    case "openPosition":
      return engine
        .openPosition(op.account, op.marketId, op.direction, op.size, op.priceLimit)
        .map(r => `${r.kind} size=${formatDecimal(r.position.size)} avg=${formatDecimal(r.fill.avgPriceX18)}`);
    case "closePosition":
      return engine
        .closePosition(op.account, op.marketId, op.size, op.priceLimit)
        .map(r => `${r.kind} size=${formatDecimal(r.position.size)} avg=${formatDecimal(r.fill.avgPriceX18)}`);
    case "liquidate":
      return engine
        .liquidate(op.liquidator, op.account, op.marketId, op.size)
        .map(r => `price=${formatDecimal(r.priceX18)} penalty=${formatDecimal(r.penaltyX18)}`);
    case "addMargin":
      return engine.addMargin(op.account, op.marketId, op.amount).map(p => `margin=${formatDecimal(p.margin)}`);
    case "removeMargin":
      return engine.removeMargin(op.account, op.marketId, op.amount).map(p => `margin=${formatDecimal(p.margin)}`);
    case "settleFunding":
      return engine.settleFunding(op.account, op.marketId).map(payment => `payment=${formatDecimal(payment)}`);
    case "pokeFunding":
      return engine
        .pokeFunding(op.marketId)
        .map(update => (update.type === "APPLIED" ? `APPLIED rate=${formatDecimal(update.rateX18)}` : update.type));
    case "pauseSwaps":
      return engine.pauseSwaps(op.caller, op.marketId).map(() => "paused");
    case "unpauseSwaps":
      return engine.unpauseSwaps(op.caller, op.marketId).map(() => "unpaused");
    case "setFeeBps":
      return engine.setFeeBps(op.caller, op.marketId, op.feeBps).map(() => `feeBps=${String(op.feeBps)}`);
    case "resetReserves":
      return engine
        .resetReserves(op.caller, op.marketId, op.price, op.baseReserve)
        .map(() => `price=${formatDecimal(op.price)}`);
    case "advanceTime":
      return ok(`now=${String(env.clock.advance(op.seconds))}`);
    case "setIndexPrice":
      return oracleFor(env, op.marketId).map(oracle => {
        oracle.setPrice(op.price);
        return `price=${formatDecimal(op.price)}`;
      });
    case "failIndexPrice":
      return oracleFor(env, op.marketId).map(oracle => {
        oracle.setFailure({ type: "UNAVAILABLE", message: op.reason });
        return "index unavailable";
      });
  }
}
