/**
 * Built-in partitioners
 */

import type { PartitionerFactory } from '../types.js'
import { createManualPartitioner } from './manual.js'
import { createRandomPartitioner } from './random.js'
import { createRoundRobinPartitioner } from './round-robin.js'

export { createRandomPartitioner, type RandomPartitionerOptions } from './random.js'
export { createRoundRobinPartitioner, type RoundRobinPartitionerOptions } from './round-robin.js'
export { createManualPartitioner } from './manual.js'
export { createHashPartitioner, encodeKey, hashToPartition, type HashPartitionerConfig } from './hash.js'
export {
	customPartitioner,
	customHashPartitioner,
	hashPartitioner,
	referenceHashPartitioner,
	unsignedHashPartitioner,
	murmur2Partitioner,
	resolveCustomPartitionerConfig,
	withHashFunction,
	withHashInterpretation,
	withFallbackPartitioner,
	withKeyBytes,
	DEFAULT_CUSTOM_PARTITIONER_CONFIG,
	type CustomPartitionerOptions,
	type ResolvedCustomPartitionerConfig,
} from './custom.js'
export { requiresConsistency } from './consistency.js'

export const randomPartitioner: PartitionerFactory = topic => createRandomPartitioner(topic)

export const roundRobinPartitioner: PartitionerFactory = topic => createRoundRobinPartitioner(topic)

export const manualPartitioner: PartitionerFactory = createManualPartitioner
