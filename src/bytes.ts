import { ClosedError } from './errors'
import { Flusher, Reader, Writer } from './types'

export class BytesReader implements Reader {
	constructor(data: Uint8Array) {
		this.#data = data
	}

	get remaining(): number {
		return this.#data.byteLength - this.#offset
	}

	get isClosed(): boolean {
		return this.#isClosed
	}

	close(): void {
		this.#isClosed = true
	}

	readSync(dst: Uint8Array): number | null {
		if(this.#isClosed) {
			return null
		}

		const len = Math.min(this.remaining, dst.byteLength)
		dst.set(this.#data.subarray(this.#offset, this.#offset + len))

		this.#offset += len
		return len
	}

	async read(dst: Uint8Array): Promise<number | null> {
		return this.readSync(dst)
	}

	#data: Uint8Array
	#offset = 0
	#isClosed = false
}

export class BytesWriter implements Writer, Flusher {
	constructor(limit: number = Infinity) {
		this.#limit = limit
	}

	get length(): number {
		return this.#length
	}

	get bytes(): Uint8Array {
		return this.#buffer.slice(0, this.#length)
	}

	get isClosed(): boolean {
		return this.#isClosed
	}

	close(): void {
		this.#isClosed = true
	}

	writeSync(src: Uint8Array): number {
		this.#throwIfClosed()

		const len = Math.min(this.#limit - this.#length, src.byteLength)
		if(len === 0) {
			return 0
		}

		this.#reserve(this.#length + len)
		this.#buffer.set(src.subarray(0, len), this.#length)

		this.#length += len
		return len
	}

	async write(src: Uint8Array): Promise<number> {
		return this.writeSync(src)
	}

	flushSync(): void {
		this.#throwIfClosed()
	}

	async flush(): Promise<void> {
		this.flushSync()
	}

	#reserve(capacity: number) {
		if(capacity <= this.#buffer.byteLength) {
			return
		}

		const next = new Uint8Array(Math.max(capacity, this.#buffer.byteLength * 2))
		next.set(this.#buffer.subarray(0, this.#length))
		this.#buffer = next
	}

	#throwIfClosed() {
		if(this.#isClosed) {
			throw new ClosedError()
		}
	}

	#buffer = new Uint8Array(0)
	#length = 0
	#limit: number
	#isClosed = false
}
