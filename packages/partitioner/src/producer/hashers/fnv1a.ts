/**
 * FNV-1a 32-bit hash
 *
 * Default hash for key-based partitioning.
 */

import type { Hash32, HashFactory } from '../types.js'

const FNV_OFFSET_BASIS = 0x811c9dc5
const FNV_PRIME = 0x01000193

class Fnv1a32 implements Hash32 {
	private state = FNV_OFFSET_BASIS

	update(data: Uint8Array): Hash32 {
		let h = this.state
		for (const byte of data) {
			h ^= byte
			h = Math.imul(h, FNV_PRIME)
		}
		this.state = h >>> 0
		return this
	}

	digest(): number {
		return this.state
	}
}

/**
 * Create a fresh FNV-1a 32-bit hash
 */
export const fnv1a32: HashFactory = () => new Fnv1a32()

/**
 * One-shot FNV-1a over a byte array
 *
 * @returns Unsigned 32-bit hash value
 */
export function fnv1a32Hash(data: Uint8Array): number {
	return fnv1a32().update(data).digest()
}
