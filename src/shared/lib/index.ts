/**
 * Shared library utilities
 */
export { ConfigError, InfrastructureError, ExtractionError, errorMessage } from './errors';
export { randomBetween, sleep, waitRandom, type Sleep } from './delay';
export { toDateKey, systemClock, type Clock } from './date-key';
export { truncateText, preview } from './text';
export { noopReporter, type ErrorReporter, type ReportContext } from './reporter';
