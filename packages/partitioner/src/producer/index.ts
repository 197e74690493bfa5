/**
 * Producer-side partitioning exports
 */

export * from './partitioners/index.js'
export * from './hashers/index.js'
export { resolvePartitionerFactory, parsePartitionerConfig, isPartitionerName, DEFAULT_PARTITIONER } from './config.js'
export { TopicPartitioners } from './topic-partitioners.js'
export { PartitionRouter } from './partition-router.js'

export type {
	PartitionerMessage,
	KeyedMessage,
	Partitioner,
	PartitionerFactory,
	Hash32,
	HashFactory,
	HashInterpretation,
	KeyBytesExtractor,
	PartitionerName,
	PartitionerSelection,
	TopicPartitionerConfig,
	PartitionerConfig,
	PartitionRouterConfig,
	PartitionAssignment,
	AssignOptions,
} from './types.js'
