import { describe, expect, it } from 'vitest'

import { stringEncoder } from '@/codec.js'
import { InvalidPartitionerConfigError } from '@/errors.js'
import { isPartitionerName, parsePartitionerConfig, resolvePartitionerFactory } from '@/producer/config.js'
import { createManualPartitioner } from '@/producer/partitioners/manual.js'

describe('resolvePartitionerFactory', () => {
	it('defaults to the hash partitioner', () => {
		const partitioner = resolvePartitionerFactory()('orders')
		expect(partitioner.name).toBe('hash')
		expect(partitioner.topic).toBe('orders')
		expect(partitioner.partition({ topic: 'orders', key: stringEncoder('hi') }, 50)).toBe(32)
	})

	it('resolves built-in names', () => {
		expect(resolvePartitionerFactory('random')('t').name).toBe('random')
		expect(resolvePartitionerFactory('round-robin')('t').name).toBe('round-robin')
		expect(resolvePartitionerFactory('manual')('t').name).toBe('manual')
		expect(resolvePartitionerFactory('hash')('t').name).toBe('hash')
	})

	it('resolves hash variants to their interpretation', () => {
		const key = stringEncoder('1468509572224')
		expect(resolvePartitionerFactory('reference-hash')('t').partition({ topic: 't', key }, 50)).toBe(0)
		expect(resolvePartitionerFactory('unsigned-hash')('t').partition({ topic: 't', key }, 50)).toBe(48)
		expect(resolvePartitionerFactory('murmur2')('t').partition({ topic: 't', key: stringEncoder('key') }, 12)).toBe(1)
	})

	it('passes factories through', () => {
		expect(resolvePartitionerFactory(createManualPartitioner)).toBe(createManualPartitioner)
	})

	it('selects per topic with a default', () => {
		const factory = resolvePartitionerFactory({
			default: 'hash',
			topics: { access_log: 'random', error_log: 'random', audit: createManualPartitioner },
		})
		expect(factory('access_log').name).toBe('random')
		expect(factory('error_log').name).toBe('random')
		expect(factory('audit').name).toBe('manual')
		expect(factory('orders').name).toBe('hash')
	})

	it('falls back to hash when a topic table has no default', () => {
		const factory = resolvePartitionerFactory({ topics: { clicks: 'round-robin' } })
		expect(factory('clicks').name).toBe('round-robin')
		expect(factory('orders').name).toBe('hash')
	})

	it('creates a new instance on every call', () => {
		const factory = resolvePartitionerFactory('round-robin')
		expect(factory('t')).not.toBe(factory('t'))
	})
})

describe('parsePartitionerConfig', () => {
	it('accepts names and topic tables', () => {
		expect(parsePartitionerConfig(undefined)).toBe('hash')
		expect(parsePartitionerConfig('murmur2')).toBe('murmur2')
		expect(parsePartitionerConfig(JSON.parse('{"default":"random","topics":{"orders":"hash"}}'))).toEqual({
			default: 'random',
			topics: { orders: 'hash' },
		})
	})

	it('rejects unknown names', () => {
		expect(() => parsePartitionerConfig('sticky')).toThrow('Unknown partitioner "sticky" at partitioner')
		expect(() => parsePartitionerConfig({ topics: { orders: 'sticky' } })).toThrow(
			'Unknown partitioner "sticky" at partitioner.topics.orders'
		)
		expect(() => parsePartitionerConfig({ default: 42 })).toThrow(InvalidPartitionerConfigError)
	})

	it('rejects unknown options and malformed values', () => {
		expect(() => parsePartitionerConfig({ fallback: 'random' })).toThrow('Unknown partitioner option "fallback"')
		expect(() => parsePartitionerConfig(['hash'])).toThrow(InvalidPartitionerConfigError)
		expect(() => parsePartitionerConfig({ topics: 'hash' })).toThrow('partitioner.topics must be an object')
	})

	it('does not treat inherited properties as names', () => {
		expect(isPartitionerName('toString')).toBe(false)
		expect(isPartitionerName('round-robin')).toBe(true)
	})
})
