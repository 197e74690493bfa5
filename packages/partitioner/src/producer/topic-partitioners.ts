import type { Logger } from '@/logger.js'
import type { Partitioner, PartitionerFactory } from './types.js'

/**
 * One partitioner instance per topic
 *
 * Instances are created on first use and kept until released, so stateful
 * strategies (round-robin) continue their sequence across messages.
 */
export class TopicPartitioners {
	private readonly instances = new Map<string, Partitioner>()

	constructor(
		private readonly factory: PartitionerFactory,
		private readonly logger: Logger
	) {}

	get(topic: string): Partitioner {
		const existing = this.instances.get(topic)
		if (existing) {
			return existing
		}

		const partitioner = this.factory(topic)
		this.instances.set(topic, partitioner)
		this.logger.debug('partitioner created', { topic, partitioner: partitioner.name })
		return partitioner
	}

	has(topic: string): boolean {
		return this.instances.has(topic)
	}

	/**
	 * Drop the instance for a topic; the next get() creates a new one
	 */
	release(topic: string): boolean {
		const released = this.instances.delete(topic)
		if (released) {
			this.logger.debug('partitioner released', { topic })
		}
		return released
	}

	clear(): void {
		const count = this.instances.size
		this.instances.clear()
		this.logger.debug('partitioners cleared', { count })
	}

	get size(): number {
		return this.instances.size
	}
}
