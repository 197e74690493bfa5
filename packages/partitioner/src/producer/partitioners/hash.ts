/**
 * Hash partitioner
 *
 * Keyed messages are routed by a 32-bit hash of their key bytes, so every
 * message with the same key lands on the same partition. Keyless messages go
 * to the fallback partitioner.
 */

import { assertPartitionCount } from '@/errors.js'
import type {
	HashFactory,
	HashInterpretation,
	KeyBytesExtractor,
	KeyedMessage,
	Partitioner,
	PartitionerMessage,
} from '../types.js'

const INT32_MIN = -0x80000000

/**
 * Resolved hash partitioner configuration, all fields set
 */
export interface HashPartitionerConfig {
	hash: HashFactory
	hashInterpretation: HashInterpretation
	fallback: Partitioner
	keyBytes: KeyBytesExtractor
}

/**
 * Default key extraction: the key's own encoding
 */
export const encodeKey: KeyBytesExtractor = message => message.key.encode()

/**
 * Map an unsigned 32-bit digest to a partition index
 */
export function hashToPartition(digest: number, partitionCount: number, interpretation: HashInterpretation): number {
	switch (interpretation) {
		case 'unsigned':
			return (digest >>> 0) % partitionCount
		case 'positive':
			return (digest & 0x7fffffff) % partitionCount
		case 'signed': {
			const h = digest | 0
			// -2^31 has no positive int32 counterpart
			const abs = h === INT32_MIN ? 0 : Math.abs(h)
			return abs % partitionCount
		}
	}
}

function isKeyed(message: PartitionerMessage): message is KeyedMessage {
	return message.key !== undefined && message.key !== null
}

/**
 * Create a hash partitioner for a topic from a fully resolved configuration
 */
export function createHashPartitioner(topic: string, config: HashPartitionerConfig): Partitioner {
	const { hash, hashInterpretation, fallback, keyBytes } = config

	return {
		name: 'hash',
		topic,
		partition(message: PartitionerMessage, partitionCount: number): number {
			assertPartitionCount(topic, partitionCount)

			if (!isKeyed(message)) {
				return fallback.partition(message, partitionCount)
			}

			// Encoding failures propagate as thrown
			const bytes = keyBytes(message)
			const digest = hash().update(bytes).digest()
			return hashToPartition(digest, partitionCount, hashInterpretation)
		},
		requiresConsistency(message: PartitionerMessage): boolean {
			return isKeyed(message)
		},
	}
}
