import { ByteCounter, CounterOptions } from './counter'
import { Reader, ReaderSync } from './types'

// Reads made on the wrapped reader directly are not counted.
export class ReadCounter<T extends ReaderSync> extends ByteCounter<T> implements ReaderSync {
	static from<T extends ReaderSync>(reader: T, options?: CounterOptions): ReadCounter<T> {
		return new ReadCounter(reader, options)
	}

	constructor(reader: T, options?: CounterOptions) {
		super(reader, 'read-counter', options)
	}

	readSync(dst: Uint8Array): number | null {
		let cnt: number | null
		try {
			cnt = this.inner.readSync(dst)
		} catch(err) {
			this.failed('read', err)
			throw err
		}

		if(cnt === null) {
			return null
		}

		return this.tally('read', cnt)
	}
}

export class AsyncReadCounter<T extends Reader> extends ByteCounter<T> implements Reader {
	constructor(reader: T, options?: CounterOptions) {
		super(reader, 'read-counter', options)
	}

	readSync(dst: Uint8Array): number | null {
		let cnt: number | null
		try {
			cnt = this.inner.readSync(dst)
		} catch(err) {
			this.failed('read', err)
			throw err
		}

		return cnt === null ? null : this.tally('read', cnt)
	}

	async read(dst: Uint8Array): Promise<number | null> {
		let cnt: number | null
		try {
			cnt = await this.inner.read(dst)
		} catch(err) {
			this.failed('read', err)
			throw err
		}

		return cnt === null ? null : this.tally('read', cnt)
	}
}
