/**
 * Partitioner selection
 *
 * Turns a name, a factory or a per-topic table into a single factory.
 */

import { InvalidPartitionerConfigError } from '@/errors.js'
import {
	hashPartitioner,
	manualPartitioner,
	murmur2Partitioner,
	randomPartitioner,
	referenceHashPartitioner,
	unsignedHashPartitioner,
	roundRobinPartitioner,
} from './partitioners/index.js'
import type {
	PartitionerConfig,
	PartitionerFactory,
	PartitionerName,
	PartitionerSelection,
	TopicPartitionerConfig,
} from './types.js'

export const DEFAULT_PARTITIONER: PartitionerName = 'hash'

const BUILT_IN_PARTITIONERS: Record<PartitionerName, PartitionerFactory> = {
	random: randomPartitioner,
	'round-robin': roundRobinPartitioner,
	hash: hashPartitioner,
	'reference-hash': referenceHashPartitioner,
	'unsigned-hash': unsignedHashPartitioner,
	murmur2: murmur2Partitioner,
	manual: manualPartitioner,
}

export function isPartitionerName(value: unknown): value is PartitionerName {
	return typeof value === 'string' && Object.prototype.hasOwnProperty.call(BUILT_IN_PARTITIONERS, value)
}

function resolveSelection(selection: PartitionerSelection, topic?: string): PartitionerFactory {
	if (typeof selection === 'function') {
		return selection
	}
	if (!isPartitionerName(selection)) {
		const where = topic === undefined ? '' : ` for topic ${topic}`
		throw new InvalidPartitionerConfigError(`Unknown partitioner "${String(selection)}"${where}`, selection, topic)
	}
	return BUILT_IN_PARTITIONERS[selection]
}

function isTopicConfig(config: PartitionerConfig): config is TopicPartitionerConfig {
	return typeof config === 'object' && config !== null
}

/**
 * Resolve partitioner configuration to a factory
 *
 * Names are checked here, so a bad configuration fails before any message
 * is routed.
 *
 * @example
 * ```typescript
 * const factory = resolvePartitionerFactory({
 *   default: 'hash',
 *   topics: { access_log: 'random', error_log: 'random' },
 * })
 * factory('access_log').name // 'random'
 * ```
 */
export function resolvePartitionerFactory(config: PartitionerConfig = DEFAULT_PARTITIONER): PartitionerFactory {
	if (!isTopicConfig(config)) {
		return resolveSelection(config)
	}

	const fallback = resolveSelection(config.default ?? DEFAULT_PARTITIONER)
	const perTopic = new Map<string, PartitionerFactory>()
	for (const [topic, selection] of Object.entries(config.topics ?? {})) {
		perTopic.set(topic, resolveSelection(selection, topic))
	}

	return topic => (perTopic.get(topic) ?? fallback)(topic)
}

function parseName(value: unknown, path: string): PartitionerName {
	if (!isPartitionerName(value)) {
		throw new InvalidPartitionerConfigError(`Unknown partitioner ${JSON.stringify(value)} at ${path}`, value)
	}
	return value
}

function isPlainObject(value: unknown): value is object {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate untyped partitioner configuration, e.g. read from a JSON file
 *
 * Only names can be expressed this way; factories are passed in code.
 */
export function parsePartitionerConfig(value: unknown): PartitionerConfig {
	if (value === undefined) {
		return DEFAULT_PARTITIONER
	}
	if (typeof value === 'string') {
		return parseName(value, 'partitioner')
	}
	if (!isPlainObject(value)) {
		throw new InvalidPartitionerConfigError('Partitioner config must be a name or an object', value)
	}

	const config: TopicPartitionerConfig = {}
	for (const [field, entry] of Object.entries(value)) {
		if (field === 'default') {
			config.default = parseName(entry, 'partitioner.default')
		} else if (field === 'topics') {
			if (!isPlainObject(entry)) {
				throw new InvalidPartitionerConfigError('partitioner.topics must be an object', entry)
			}
			const topics: Record<string, PartitionerName> = {}
			for (const [topic, name] of Object.entries(entry)) {
				topics[topic] = parseName(name, `partitioner.topics.${topic}`)
			}
			config.topics = topics
		} else {
			throw new InvalidPartitionerConfigError(`Unknown partitioner option "${field}"`, entry)
		}
	}
	return config
}
