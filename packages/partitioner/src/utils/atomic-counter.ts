/**
 * Unsigned 64-bit counter backed by a SharedArrayBuffer
 *
 * Read-and-increment is a single Atomics.add, so no two callers observe the
 * same value, including callers in worker threads that were handed `buffer`.
 */
export class AtomicCounter {
	readonly buffer: SharedArrayBuffer
	private readonly cell: BigUint64Array

	/**
	 * @param buffer - Share an existing counter (e.g. one posted to a worker)
	 */
	constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(BigUint64Array.BYTES_PER_ELEMENT)) {
		this.buffer = buffer
		this.cell = new BigUint64Array(buffer, 0, 1)
	}

	/**
	 * Increment and return the value before the increment
	 */
	next(): bigint {
		return Atomics.add(this.cell, 0, 1n)
	}

	current(): bigint {
		return Atomics.load(this.cell, 0)
	}
}
