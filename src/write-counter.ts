import { ByteCounter, CounterOptions } from './counter'
import { Flusher, FlusherSync, Writer, WriterSync, isFlusher, isFlusherSync } from './types'

export class WriteCounter<T extends WriterSync> extends ByteCounter<T> implements WriterSync, FlusherSync {
	static from<T extends WriterSync>(writer: T, options?: CounterOptions): WriteCounter<T> {
		return new WriteCounter(writer, options)
	}

	constructor(writer: T, options?: CounterOptions) {
		super(writer, 'write-counter', options)
	}

	writeSync(src: Uint8Array): number {
		let cnt: number
		try {
			cnt = this.inner.writeSync(src)
		} catch(err) {
			this.failed('write', err)
			throw err
		}

		return this.tally('write', cnt)
	}

	flushSync(): void {
		const w = this.inner
		if(isFlusherSync(w)) {
			w.flushSync()
		}
	}
}

export class AsyncWriteCounter<T extends Writer> extends ByteCounter<T> implements Writer, Flusher {
	constructor(writer: T, options?: CounterOptions) {
		super(writer, 'write-counter', options)
	}

	writeSync(src: Uint8Array): number {
		let cnt: number
		try {
			cnt = this.inner.writeSync(src)
		} catch(err) {
			this.failed('write', err)
			throw err
		}

		return this.tally('write', cnt)
	}

	async write(src: Uint8Array): Promise<number> {
		let cnt: number
		try {
			cnt = await this.inner.write(src)
		} catch(err) {
			this.failed('write', err)
			throw err
		}

		return this.tally('write', cnt)
	}

	flushSync(): void {
		const w = this.inner
		if(isFlusherSync(w)) {
			w.flushSync()
		}
	}

	async flush(): Promise<void> {
		const w = this.inner
		if(isFlusher(w)) {
			await w.flush()
		} else if(isFlusherSync(w)) {
			w.flushSync()
		}
	}
}
