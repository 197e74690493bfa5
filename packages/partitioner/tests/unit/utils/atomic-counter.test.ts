import { describe, expect, it } from 'vitest'

import { AtomicCounter } from '@/utils/atomic-counter.js'

describe('AtomicCounter', () => {
	it('returns the value before each increment', () => {
		const counter = new AtomicCounter()
		expect(counter.next()).toBe(0n)
		expect(counter.next()).toBe(1n)
		expect(counter.current()).toBe(2n)
	})

	it('shares state through its buffer', () => {
		const counter = new AtomicCounter()
		const view = new AtomicCounter(counter.buffer)
		counter.next()
		expect(view.next()).toBe(1n)
		expect(counter.current()).toBe(2n)
	})

	it('keeps counting past the 32-bit range', () => {
		const counter = new AtomicCounter()
		new BigUint64Array(counter.buffer)[0] = 0xffffffffn
		expect(counter.next()).toBe(0xffffffffn)
		expect(counter.next()).toBe(0x100000000n)
		expect(counter.current()).toBe(0x100000001n)
	})
})
