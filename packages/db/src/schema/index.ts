/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Single source of truth for all database schemas
 * - timestamptz (UTC) everywhere, time column named 'ts'
 */

// Clearing events (append only)
export * from "./clearing-event";

// Latest state (1 row per account and market, upsert)
export * from "./position-snapshot";
