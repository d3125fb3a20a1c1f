/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface-based repository pattern
 * - Postgres implementations over @perp-clearing/db
 * - In-memory implementations for local runs and tests
 */

export * from "./interfaces";
export * from "./postgres";
export * from "./memory";
