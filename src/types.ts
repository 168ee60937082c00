export interface ReaderSync {
	// `0` at end of stream, `null` once the reader is closed.
	readSync(dst: Uint8Array): number | null
}

export interface WriterSync {
	writeSync(src: Uint8Array): number
}

export interface FlusherSync {
	flushSync(): void
}

export interface Reader extends ReaderSync {
	read(dst: Uint8Array): Promise<number | null>
}

export interface Writer extends WriterSync {
	write(src: Uint8Array): Promise<number>
}

export interface Flusher extends FlusherSync {
	flush(): Promise<void>
}

export interface Counter {
	count(): number
}

export function isFlusherSync(w: object): w is FlusherSync {
	return 'flushSync' in w && typeof w.flushSync === 'function'
}

export function isFlusher(w: object): w is Flusher {
	return isFlusherSync(w) && 'flush' in w && typeof w.flush === 'function'
}
