import { Readable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { readFirstLine } from '../src/stdin.ts'

const stream = (...chunks: string[]) => Readable.from(chunks.map((chunk) => Buffer.from(chunk)))

describe('readFirstLine', () => {
	it('returns only the first line', async () => {
		await expect(readFirstLine(stream('3 + 4\nsecond\n'))).resolves.toBe('3 + 4')
	})

	it('joins a line split across chunks', async () => {
		await expect(readFirstLine(stream('( 1 +', ' 2 ) * 3\n'))).resolves.toBe('( 1 + 2 ) * 3')
	})

	it('accepts a final line without a newline', async () => {
		await expect(readFirstLine(stream('5'))).resolves.toBe('5')
	})

	it('strips a carriage return', async () => {
		await expect(readFirstLine(stream('1 / 0\r\n'))).resolves.toBe('1 / 0')
	})

	it('returns undefined for an empty stream', async () => {
		await expect(readFirstLine(stream())).resolves.toBeUndefined()
	})
})
