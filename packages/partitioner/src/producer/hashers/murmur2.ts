/**
 * Murmur2 hash - Java Kafka client compatible
 *
 * Matches org.apache.kafka.common.utils.Utils.murmur2, seed 0x9747b28c.
 */

import type { Hash32, HashFactory } from '../types.js'

/**
 * Java-compatible murmur2 hash function
 *
 * @returns 32-bit signed hash value
 */
export function murmur2Hash(data: Uint8Array): number {
	const seed = 0x9747b28c
	const m = 0x5bd1e995
	const r = 24

	let h = seed ^ data.length
	let length = data.length
	let offset = 0

	while (length >= 4) {
		let k =
			(data[offset]! & 0xff) |
			((data[offset + 1]! & 0xff) << 8) |
			((data[offset + 2]! & 0xff) << 16) |
			((data[offset + 3]! & 0xff) << 24)

		k = Math.imul(k, m)
		k ^= k >>> r
		k = Math.imul(k, m)

		h = Math.imul(h, m)
		h ^= k

		offset += 4
		length -= 4
	}

	switch (length) {
		case 3:
			h ^= (data[offset + 2]! & 0xff) << 16
		// falls through
		case 2:
			h ^= (data[offset + 1]! & 0xff) << 8
		// falls through
		case 1:
			h ^= data[offset]! & 0xff
			h = Math.imul(h, m)
	}

	h ^= h >>> 13
	h = Math.imul(h, m)
	h ^= h >>> 15

	return h
}

/**
 * Murmur2 has no incremental form, so chunks are buffered until digest.
 */
class Murmur2 implements Hash32 {
	private readonly chunks: Uint8Array[] = []

	update(data: Uint8Array): Hash32 {
		this.chunks.push(data)
		return this
	}

	digest(): number {
		const data = this.chunks.length === 1 ? this.chunks[0]! : Buffer.concat(this.chunks)
		return murmur2Hash(data) >>> 0
	}
}

/**
 * Create a fresh murmur2 hash
 */
export const murmur2: HashFactory = () => new Murmur2()
