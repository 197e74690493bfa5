// Partitioning strategies, hashers and routing
export * from '@/producer/index.js'

// Encodable values
export {
	codec,
	encoded,
	stringEncoder,
	bufferEncoder,
	jsonEncoder,
	type Codec,
	type Encoder,
} from '@/codec.js'

// Errors
export {
	PartitionerError,
	InvalidPartitionCountError,
	InvalidPartitionError,
	EncodingError,
	InvalidPartitionerConfigError,
	assertPartitionCount,
	isPartitionerError,
} from '@/errors.js'

// Utils
export { AtomicCounter } from '@/utils/atomic-counter.js'

// Logger
export { createLogger, noopLogger, resolveLogger, type Logger, type LogLevel, type LoggingOptions } from '@/logger.js'
