/**
 * Manual partitioner
 *
 * Uses the partition set on the message. No bounds check is made against the
 * partition count; PartitionRouter rejects out-of-range choices.
 */

import type { Partitioner, PartitionerMessage } from '../types.js'

export function createManualPartitioner(topic: string): Partitioner {
	return {
		name: 'manual',
		topic,
		partition(message: PartitionerMessage): number {
			return message.partition ?? 0
		},
		// An explicit partition must not move on retry
		requiresConsistency(): boolean {
			return true
		},
	}
}
