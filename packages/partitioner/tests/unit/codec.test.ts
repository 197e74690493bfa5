import { describe, expect, it } from 'vitest'

import { buffer, bufferEncoder, codec, encoded, json, jsonEncoder, string, stringEncoder, type Codec } from '@/codec.js'
import { EncodingError } from '@/errors.js'

describe('codec', () => {
	describe('string()', () => {
		it('encodes a string to a UTF-8 buffer', () => {
			const c = string()
			const bytes = c.encode('hello')
			expect(Buffer.isBuffer(bytes)).toBe(true)
			expect(bytes.toString('utf-8')).toBe('hello')
		})

		it('decodes a UTF-8 buffer to a string', () => {
			expect(string().decode(Buffer.from('world', 'utf-8'))).toBe('world')
		})
	})

	describe('json()', () => {
		it('encodes an object to a JSON buffer', () => {
			const c = json<{ name: string }>()
			expect(c.encode({ name: 'test' }).toString('utf-8')).toBe('{"name":"test"}')
		})

		it('rejects values without a JSON representation', () => {
			expect(() => json<undefined>().encode(undefined)).toThrow(EncodingError)
		})
	})

	describe('buffer()', () => {
		it('returns the same buffer on encode and decode', () => {
			const c = buffer()
			const buf = Buffer.from([1, 2, 3, 4])
			expect(c.encode(buf)).toBe(buf)
			expect(c.decode(buf)).toBe(buf)
		})
	})

	it('exports codec factories on the namespace', () => {
		expect(codec.string).toBe(string)
		expect(codec.json).toBe(json)
		expect(codec.buffer).toBe(buffer)
	})
})

describe('encoders', () => {
	it('encodes strings and reports their byte length', () => {
		const key = stringEncoder('café')
		expect(key.encode()).toEqual(Buffer.from('café', 'utf-8'))
		expect(key.length()).toBe(5)
	})

	it('passes buffers through', () => {
		const bytes = Buffer.from([0x00, 0xff])
		expect(bufferEncoder(bytes).encode()).toBe(bytes)
		expect(bufferEncoder(bytes).length()).toBe(2)
	})

	it('encodes JSON values', () => {
		expect(jsonEncoder({ id: 1 }).encode().toString('utf-8')).toBe('{"id":1}')
	})

	it('wraps codec failures in EncodingError', () => {
		const key = jsonEncoder({ id: 1n })
		let thrown: unknown
		try {
			key.encode()
		} catch (error) {
			thrown = error
		}
		expect(thrown).toBeInstanceOf(EncodingError)
		expect(thrown instanceof EncodingError && thrown.cause).toBeInstanceOf(TypeError)
		expect(thrown instanceof EncodingError && thrown.message).toBe(
			'Failed to encode value: Do not know how to serialize a BigInt'
		)
	})

	it('rethrows EncodingError from a codec unchanged', () => {
		const failure = new EncodingError('unsupported key')
		const failing: Codec<string> = {
			encode: () => {
				throw failure
			},
			decode: buffer => buffer.toString(),
		}
		expect(() => encoded(failing, 'x').encode()).toThrow(failure)
	})
})
