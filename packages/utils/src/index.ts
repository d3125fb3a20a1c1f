export { isLogLevel, LogLevel, logger, stringify, type Logger, type LogRecord, type LogSink } from "./logger";
export { SerialQueue } from "./serial-queue";
export { createIntervalWorker, type IntervalWorker, type WorkerOptions } from "./worker";
