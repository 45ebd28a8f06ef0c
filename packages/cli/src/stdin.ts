import { createInterface } from 'node:readline'

/**
 * Resolve to the first line of `input`, or `undefined` if the stream ends without one.
 */
export async function readFirstLine(input: NodeJS.ReadableStream): Promise<string | undefined> {
	const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })
	try {
		for await (const line of lines) {
			return line
		}
		return undefined
	} finally {
		lines.close()
	}
}
