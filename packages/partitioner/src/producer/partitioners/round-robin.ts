/**
 * Round-robin partitioner
 *
 * Distributes messages evenly across partitions regardless of key.
 */

import { assertPartitionCount } from '@/errors.js'
import { AtomicCounter } from '@/utils/atomic-counter.js'
import type { Partitioner, PartitionerMessage } from '../types.js'

export interface RoundRobinPartitionerOptions {
	/** Counter to draw from, e.g. one shared with a worker thread */
	counter?: AtomicCounter
}

/**
 * Create a round-robin partitioner for a topic
 *
 * Call `i` on an instance returns `i mod partitionCount`. The counter keeps
 * advancing when the partition count changes between calls; the sequence is
 * then only guaranteed to stay in range.
 *
 * @example
 * ```typescript
 * const partitioner = createRoundRobinPartitioner('clicks')
 * partitioner.partition({ topic: 'clicks' }, 3) // 0
 * partitioner.partition({ topic: 'clicks' }, 3) // 1
 * ```
 */
export function createRoundRobinPartitioner(topic: string, options: RoundRobinPartitionerOptions = {}): Partitioner {
	const counter = options.counter ?? new AtomicCounter()

	return {
		name: 'round-robin',
		topic,
		partition(_message: PartitionerMessage, partitionCount: number): number {
			assertPartitionCount(topic, partitionCount)
			return Number(counter.next() % BigInt(partitionCount))
		},
	}
}
