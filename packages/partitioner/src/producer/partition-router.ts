import { InvalidPartitionError, assertPartitionCount } from '@/errors.js'
import { resolveLogger, type Logger } from '@/logger.js'
import { resolvePartitionerFactory } from './config.js'
import { requiresConsistency } from './partitioners/consistency.js'
import { TopicPartitioners } from './topic-partitioners.js'
import type {
	AssignOptions,
	PartitionAssignment,
	Partitioner,
	PartitionerMessage,
	PartitionRouterConfig,
} from './types.js'

/**
 * Routes outgoing messages to partitions
 *
 * The producer-side owner of partitioner instances. It resolves the configured
 * factory once, keeps one instance per topic, and applies the retry rule: a
 * message whose partitioner requires consistency keeps its previous partition.
 *
 * @example
 * ```typescript
 * const router = new PartitionRouter({ partitioner: { default: 'hash', topics: { clicks: 'round-robin' } } })
 * const { partition } = router.assign({ topic: 'orders', key: stringEncoder('order-1') }, 12)
 * ```
 */
export class PartitionRouter {
	private readonly partitioners: TopicPartitioners
	private readonly logger: Logger

	constructor(config: PartitionRouterConfig = {}) {
		this.logger = resolveLogger(config, { component: 'partition-router' })
		this.partitioners = new TopicPartitioners(resolvePartitionerFactory(config.partitioner), this.logger)
	}

	/**
	 * Choose the partition for a message
	 *
	 * @param partitionCount - Current partition count of the message's topic
	 * @throws InvalidPartitionCountError when partitionCount is not a positive integer
	 * @throws InvalidPartitionError when the strategy picks a partition out of range
	 */
	assign(message: PartitionerMessage, partitionCount: number, options: AssignOptions = {}): PartitionAssignment {
		const { topic } = message
		assertPartitionCount(topic, partitionCount)

		const partitioner = this.partitioners.get(topic)
		const consistent = requiresConsistency(partitioner, message)

		if (options.previousPartition !== undefined && consistent) {
			this.logger.debug('keeping partition on retry', { topic, partition: options.previousPartition })
			return { partition: this.checkRange(topic, options.previousPartition, partitionCount), requiresConsistency: true }
		}

		const partition = partitioner.partition(message, partitionCount)
		return { partition: this.checkRange(topic, partition, partitionCount), requiresConsistency: consistent }
	}

	/**
	 * Partitioner instance for a topic, created on first use
	 */
	partitionerFor(topic: string): Partitioner {
		return this.partitioners.get(topic)
	}

	/**
	 * Forget the partitioner for a topic the producer no longer writes to
	 */
	releaseTopic(topic: string): boolean {
		return this.partitioners.release(topic)
	}

	close(): void {
		this.partitioners.clear()
	}

	private checkRange(topic: string, partition: number, partitionCount: number): number {
		if (!Number.isInteger(partition) || partition < 0 || partition >= partitionCount) {
			this.logger.warn('partition out of range', { topic, partition, partitionCount })
			throw new InvalidPartitionError(topic, partition, partitionCount)
		}
		return partition
	}
}
