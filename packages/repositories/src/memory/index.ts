export { MemoryClearingEventRepository, MemoryPositionSnapshotRepository } from "./memory-repositories";
