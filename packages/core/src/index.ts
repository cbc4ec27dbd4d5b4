/**
 * @relaylog/core: dispatch engine and logger facade.
 */

export { Logger, createLogger, DEFAULT_CATEGORY } from './logger.js';
export {
	DispatchEngine,
	DEFAULT_BUFFER_SIZE,
	EXIT_MESSAGE,
	FATAL_CALL_STACK_DEPTH,
} from './engine.js';
export type { EngineOptions, EntryOrigin } from './engine.js';
export { LoggerWriter } from './writer.js';
export { BoundedQueue } from './queue.js';
export { DeliveryTracker } from './tracker.js';
export { captureCallStack } from './callstack.js';
export {
	concatArgs,
	defaultFormatter,
	formatLocalTime,
	formatRfc3339,
	formatTemplate,
	normalFormatter,
} from './format.js';
export { loadConfig, optionsFromConfig, optionsFromEnv } from './config.js';
export {
	ConfigurationError,
	FatalError,
	RelayLogError,
	TargetCloseError,
	TargetError,
	TargetOpenError,
	TargetProcessError,
	describeError,
} from './errors.js';
