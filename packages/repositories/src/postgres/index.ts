export { createPostgresClearingEventRepository } from "./clearing-event-repository";
export { createPostgresPositionSnapshotRepository, latestPerKey } from "./position-snapshot-repository";
