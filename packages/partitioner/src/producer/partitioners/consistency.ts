import type { Partitioner, PartitionerMessage } from '../types.js'

/**
 * Whether a message's partition must stay fixed across retries
 *
 * Partitioners that do not declare `requiresConsistency` never require it.
 */
export function requiresConsistency(partitioner: Partitioner, message: PartitionerMessage): boolean {
	return partitioner.requiresConsistency?.(message) ?? false
}
