/**
 * packages/adapters - Collaborator ports and adapters
 *
 * - Port interfaces the clearing engine depends on
 * - In-memory implementations for tests, replays and local runs
 */

// Port interfaces
export * from "./ports";

// In-memory adapters
export * from "./memory";
