import { EncodingError, isPartitionerError } from '@/errors.js'

export interface Codec<T> {
	encode(value: T): Buffer
	decode(buffer: Buffer): T
}

/**
 * A value that knows how to turn itself into bytes. `encode` may throw.
 */
export interface Encoder {
	encode(): Buffer
	length(): number
}

export function string(): Codec<string> {
	return {
		encode: value => Buffer.from(value, 'utf-8'),
		decode: buffer => buffer.toString('utf-8'),
	}
}

export function json<T>(): Codec<T> {
	return {
		encode: value => {
			const text: string | undefined = JSON.stringify(value)
			if (text === undefined) {
				throw new EncodingError('Value has no JSON representation')
			}
			return Buffer.from(text, 'utf-8')
		},
		decode: buffer => JSON.parse(buffer.toString('utf-8')) as T,
	}
}

export function buffer(): Codec<Buffer> {
	return {
		encode: value => value,
		decode: value => value,
	}
}

export const codec = {
	string,
	json,
	buffer,
}

/**
 * Bind a value to a codec, producing an Encoder
 *
 * Failures thrown by the codec surface as EncodingError.
 */
export function encoded<T>(valueCodec: Codec<T>, value: T): Encoder {
	const encode = (): Buffer => {
		try {
			return valueCodec.encode(value)
		} catch (error) {
			if (isPartitionerError(error)) {
				throw error
			}
			throw new EncodingError('Failed to encode value', error)
		}
	}

	return {
		encode,
		length: () => encode().length,
	}
}

export function stringEncoder(value: string): Encoder {
	return encoded(string(), value)
}

export function bufferEncoder(value: Buffer): Encoder {
	return encoded(buffer(), value)
}

export function jsonEncoder<T>(value: T): Encoder {
	return encoded(json<T>(), value)
}
