/**
 * Repository Interfaces
 */

export * from "./repository-error";
export * from "./clearing-event-repository";
export * from "./position-snapshot-repository";
