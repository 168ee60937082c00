export class ClosedError extends Error {
	constructor(message = 'stream is closed') {
		super(message)
		this.name = 'ClosedError'
	}
}

/**
 * Thrown when a running byte count would go past `Number.MAX_SAFE_INTEGER`.
 * This is a programming error rather than an I/O failure.
 */
export class CounterOverflowError extends Error {
	constructor(readonly count: number, readonly delta: number) {
		super(`byte count overflow: ${count} + ${delta} exceeds ${Number.MAX_SAFE_INTEGER}`)
		this.name = 'CounterOverflowError'
	}
}

export class InvalidByteCountError extends Error {
	constructor(readonly delta: number) {
		super(`invalid byte count reported by the wrapped stream: ${delta}`)
		this.name = 'InvalidByteCountError'
	}
}
