/**
 * Random partitioner
 *
 * Ignores the message and draws uniformly from the topic's partitions.
 */

import { assertPartitionCount } from '@/errors.js'
import type { Partitioner, PartitionerMessage } from '../types.js'

export interface RandomPartitionerOptions {
	/** Source of uniform numbers in [0, 1) (default: Math.random) */
	random?: () => number
}

/**
 * Create a random partitioner for a topic
 */
export function createRandomPartitioner(topic: string, options: RandomPartitionerOptions = {}): Partitioner {
	const random = options.random ?? Math.random

	return {
		name: 'random',
		topic,
		partition(_message: PartitionerMessage, partitionCount: number): number {
			assertPartitionCount(topic, partitionCount)
			return Math.floor(random() * partitionCount)
		},
	}
}
