/**
 * Partitioner type definitions
 */

import type { Encoder } from '@/codec.js'
import type { Logger, LogLevel } from '@/logger.js'

// ==================== Messages ====================

/**
 * Message as seen by a partitioner. Partitioners never mutate it.
 */
export interface PartitionerMessage {
	/** Topic the message is produced to */
	readonly topic: string
	/** Message key (absent or null when the message is keyless) */
	readonly key?: Encoder | null
	/** Message value, opaque to partitioners */
	readonly value?: Encoder | null
	/** Explicit partition, read only by the manual partitioner (default: 0) */
	readonly partition?: number
}

/**
 * Message known to carry a key
 */
export type KeyedMessage = PartitionerMessage & { readonly key: Encoder }

// ==================== Strategies ====================

/**
 * Partitioning strategy bound to a single topic
 */
export interface Partitioner {
	/** Strategy name, for logs */
	readonly name: string
	/** Topic this instance was created for */
	readonly topic: string

	/**
	 * Choose the partition for a message
	 *
	 * @param partitionCount - Live partition count of the topic, never cached
	 * @returns Partition index in [0, partitionCount)
	 */
	partition(message: PartitionerMessage, partitionCount: number): number

	/**
	 * Whether this message's partition must stay the same across retries.
	 * Strategies that leave it out are treated as returning false.
	 */
	requiresConsistency?(message: PartitionerMessage): boolean
}

/**
 * Build the strategy instance for a topic. Called once per topic.
 */
export type PartitionerFactory = (topic: string) => Partitioner

// ==================== Hashing ====================

/**
 * 32-bit hash computation. A fresh instance is created for every message.
 */
export interface Hash32 {
	update(data: Uint8Array): Hash32
	/** Unsigned 32-bit digest */
	digest(): number
}

export type HashFactory = () => Hash32

/**
 * How the 32-bit digest is turned into a partition index
 *
 * - `signed`: two's-complement signed value, absolute value, modulo. The
 *   minimum 32-bit value maps to 0.
 * - `unsigned`: digest modulo partition count.
 * - `positive`: sign bit masked off, then modulo.
 */
export type HashInterpretation = 'signed' | 'unsigned' | 'positive'

/**
 * Derive the bytes to hash from a keyed message. May throw.
 */
export type KeyBytesExtractor = (message: KeyedMessage) => Uint8Array

// ==================== Configuration ====================

/**
 * Built-in partitioner names
 */
export type PartitionerName = 'random' | 'round-robin' | 'hash' | 'reference-hash' | 'unsigned-hash' | 'murmur2' | 'manual'

/**
 * A partitioner can be selected by name or by factory
 */
export type PartitionerSelection = PartitionerName | PartitionerFactory

/**
 * Per-topic partitioner selection
 */
export interface TopicPartitionerConfig {
	/** Used for topics without their own entry (default: 'hash') */
	default?: PartitionerSelection
	/** Topic name to selection */
	topics?: Record<string, PartitionerSelection>
}

export type PartitionerConfig = PartitionerSelection | TopicPartitionerConfig

/**
 * Partition router configuration
 */
export interface PartitionRouterConfig {
	/** Partitioner selection (default: 'hash') */
	partitioner?: PartitionerConfig
	/** Logger instance (optional, defaults to no-op) */
	logger?: Logger
	/** Log level when using the default logger */
	logLevel?: LogLevel
}

/**
 * Outcome of routing one message
 */
export interface PartitionAssignment {
	partition: number
	/** Whether a retry of this message must keep the partition */
	requiresConsistency: boolean
}

export interface AssignOptions {
	/** Partition chosen by the previous attempt, when this is a retry */
	previousPartition?: number
}
