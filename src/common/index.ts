/**
 * Common utilities shared across modules
 */

export {
    Logger,
    createLogger,
    configureLogger,
    resetLogger,
    setLogLevel,
    getLogLevel,
    isLogLevel,
    silentLogger,
    createMemorySink,
} from './logger';
export type { LogLevel, LogData, LogEntry, LoggerConfig, LogSink, MemorySink, RecordedEntry } from './logger';
export {
    DepscopeError,
    WorkerPoolError,
    RootEnumerationError,
    ConfigError,
    errorMessage,
    errorCode,
} from './errors';
export type { DepscopeErrorCode } from './errors';
export { normalizePath, toRootRelative } from './paths';
