export { ClearingHouse } from "./clearing-house";
export {
  EventWriter,
  toEventRecord,
  toSnapshotRecord,
  type DeadLetterEntry,
  type EventWriterOptions,
  type EventWriterRepositories,
  type PositionReader,
} from "./event-writer";
export { loadMarketsConfig, parseMarketsConfig, type ConfigError } from "./markets-config";
export { buildVenue, type Venue, type VenueError, type VenueOptions } from "./venue";
