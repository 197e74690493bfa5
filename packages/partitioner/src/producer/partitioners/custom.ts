/**
 * Configurable hash partitioner
 *
 * Options are plain records applied in order over the defaults; a field left
 * undefined keeps the value from before it.
 */

import { fnv1a32 } from '../hashers/fnv1a.js'
import { murmur2 } from '../hashers/murmur2.js'
import type {
	HashFactory,
	HashInterpretation,
	KeyBytesExtractor,
	Partitioner,
	PartitionerFactory,
} from '../types.js'
import { createHashPartitioner, encodeKey, type HashPartitionerConfig } from './hash.js'
import { createRandomPartitioner } from './random.js'

/**
 * Override for one or more custom partitioner settings
 */
export interface CustomPartitionerOptions {
	/** Hash primitive (default: fnv1a32) */
	hash?: HashFactory
	/** Digest interpretation (default: 'signed') */
	hashInterpretation?: HashInterpretation
	/**
	 * Partitioner for keyless messages (default: random). A factory is called
	 * with the topic; an instance is used as is, and shared by every topic.
	 */
	fallback?: Partitioner | PartitionerFactory
	/** Bytes to hash for a keyed message (default: the encoded key) */
	keyBytes?: KeyBytesExtractor
}

/**
 * Custom partitioner settings with all defaults applied
 */
export interface ResolvedCustomPartitionerConfig {
	hash: HashFactory
	hashInterpretation: HashInterpretation
	fallback: Partitioner | PartitionerFactory
	keyBytes: KeyBytesExtractor
}

/**
 * Default custom partitioner settings
 */
export const DEFAULT_CUSTOM_PARTITIONER_CONFIG: Readonly<ResolvedCustomPartitionerConfig> = {
	hash: fnv1a32,
	hashInterpretation: 'signed',
	fallback: createRandomPartitioner,
	keyBytes: encodeKey,
}

/**
 * Apply option records, in order, over the defaults
 */
export function resolveCustomPartitionerConfig(
	options: readonly CustomPartitionerOptions[]
): ResolvedCustomPartitionerConfig {
	const config: ResolvedCustomPartitionerConfig = { ...DEFAULT_CUSTOM_PARTITIONER_CONFIG }

	for (const option of options) {
		if (option.hash !== undefined) config.hash = option.hash
		if (option.hashInterpretation !== undefined) config.hashInterpretation = option.hashInterpretation
		if (option.fallback !== undefined) config.fallback = option.fallback
		if (option.keyBytes !== undefined) config.keyBytes = option.keyBytes
	}

	return config
}

function bindConfig(topic: string, config: ResolvedCustomPartitionerConfig): HashPartitionerConfig {
	return {
		hash: config.hash,
		hashInterpretation: config.hashInterpretation,
		fallback: typeof config.fallback === 'function' ? config.fallback(topic) : config.fallback,
		keyBytes: config.keyBytes,
	}
}

/**
 * Create a partitioner factory from option overrides
 *
 * @example
 * ```typescript
 * const factory = customPartitioner(
 *   withFallbackPartitioner(createRoundRobinPartitioner('orders')),
 *   withKeyBytes(message => Buffer.from(message.key.encode().toString().split('::')[0] ?? '')),
 * )
 * const partitioner = factory('orders')
 * ```
 */
export function customPartitioner(...options: CustomPartitionerOptions[]): PartitionerFactory {
	const config = resolveCustomPartitionerConfig(options)
	return topic => createHashPartitioner(topic, bindConfig(topic, config))
}

export function withHashFunction(hash: HashFactory): CustomPartitionerOptions {
	return { hash }
}

export function withHashInterpretation(hashInterpretation: HashInterpretation): CustomPartitionerOptions {
	return { hashInterpretation }
}

export function withFallbackPartitioner(fallback: Partitioner | PartitionerFactory): CustomPartitionerOptions {
	return { fallback }
}

export function withKeyBytes(keyBytes: KeyBytesExtractor): CustomPartitionerOptions {
	return { keyBytes }
}

// ==================== Ready-made factories ====================

/**
 * Default key-hash partitioner: FNV-1a, signed interpretation, random fallback
 */
export const hashPartitioner: PartitionerFactory = customPartitioner()

/**
 * Hash partitioner using another hash primitive
 */
export function customHashPartitioner(hash: HashFactory): PartitionerFactory {
	return customPartitioner(withHashFunction(hash))
}

/**
 * FNV-1a with the sign bit masked, the way the Java reference client turns a
 * hash into a partition
 */
export const referenceHashPartitioner: PartitionerFactory = customPartitioner(withHashInterpretation('positive'))

/**
 * FNV-1a read as an unsigned digest (librdkafka-style)
 */
export const unsignedHashPartitioner: PartitionerFactory = customPartitioner(withHashInterpretation('unsigned'))

/**
 * Kafka Java client compatible partitioner: murmur2 with the sign bit masked
 */
export const murmur2Partitioner: PartitionerFactory = customPartitioner(
	withHashFunction(murmur2),
	withHashInterpretation('positive')
)
