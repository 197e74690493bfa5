/**
 * Partitioner error hierarchy
 *
 * Every failure surfaces synchronously from the call that caused it. None of
 * these errors are retriable: retrying the same call yields the same failure.
 */

/**
 * Base class for all partitioner errors
 */
export class PartitionerError extends Error {
	/** Topic the failing call was made for, when known */
	readonly topic?: string

	/** Whether retrying the same call could succeed */
	readonly retriable: boolean = false

	constructor(message: string, topic?: string) {
		super(message)
		this.name = 'PartitionerError'
		this.topic = topic

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Partition count is not a positive integer
 */
export class InvalidPartitionCountError extends PartitionerError {
	readonly partitionCount: number

	constructor(topic: string, partitionCount: number) {
		super(`Invalid partition count for ${topic}: ${partitionCount} (expected a positive integer)`, topic)
		this.name = 'InvalidPartitionCountError'
		this.partitionCount = partitionCount
	}
}

/**
 * A strategy chose a partition outside [0, partitionCount)
 */
export class InvalidPartitionError extends PartitionerError {
	readonly partition: number
	readonly partitionCount: number

	constructor(topic: string, partition: number, partitionCount: number) {
		super(`Partition ${partition} is out of range for ${topic} (${partitionCount} partitions)`, topic)
		this.name = 'InvalidPartitionError'
		this.partition = partition
		this.partitionCount = partitionCount
	}
}

/**
 * A key or value could not be encoded to bytes
 */
export class EncodingError extends PartitionerError {
	override readonly cause?: unknown

	constructor(message: string, cause?: unknown) {
		const causeStr = cause instanceof Error ? `: ${cause.message}` : ''
		super(`${message}${causeStr}`)
		this.name = 'EncodingError'
		this.cause = cause
	}
}

/**
 * Partitioner configuration names something that does not exist
 */
export class InvalidPartitionerConfigError extends PartitionerError {
	readonly value: unknown

	constructor(message: string, value: unknown, topic?: string) {
		super(message, topic)
		this.name = 'InvalidPartitionerConfigError'
		this.value = value
	}
}

/**
 * Throw unless the partition count is a positive integer
 */
export function assertPartitionCount(topic: string, partitionCount: number): void {
	if (!Number.isInteger(partitionCount) || partitionCount <= 0) {
		throw new InvalidPartitionCountError(topic, partitionCount)
	}
}

/**
 * Check if an error is a PartitionerError
 */
export function isPartitionerError(error: unknown): error is PartitionerError {
	return error instanceof PartitionerError
}
