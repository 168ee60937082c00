import winston from 'winston'

import { CounterOverflowError, InvalidByteCountError } from './errors'
import { logger } from './logger'
import { Counter } from './types'

export interface CounterOptions {
	logger?: winston.Logger
	// Prepended to every log message as `[label] `.
	label?: string
}

export abstract class ByteCounter<T> implements Counter {
	constructor(inner: T, label: string, options: CounterOptions = {}) {
		this.#inner = inner
		this.#logger = options.logger ?? logger
		this.#prefix = `[${options.label ?? label}] `
	}

	get inner(): T {
		return this.#inner
	}

	count(): number {
		return this.#count
	}

	protected tally(op: string, n: number): number {
		if(!Number.isSafeInteger(n) || n < 0) {
			this.#logger.error(`${op} reported an invalid byte count`, { prefix: this.#prefix, count: this.#count, delta: n })
			throw new InvalidByteCountError(n)
		}

		const next = this.#count + n
		if(next > Number.MAX_SAFE_INTEGER) {
			this.#logger.error(`${op} overflowed the byte count`, { prefix: this.#prefix, count: this.#count, delta: n })
			throw new CounterOverflowError(this.#count, n)
		}

		this.#count = next
		if(this.#logger.isDebugEnabled()) {
			this.#logger.debug(`${op} ${n} bytes`, { prefix: this.#prefix, count: next })
		}
		return n
	}

	protected failed(op: string, err: unknown): void {
		if(this.#logger.isDebugEnabled()) {
			this.#logger.debug(`${op} failed`, { prefix: this.#prefix, count: this.#count, error: err })
		}
	}

	#inner: T
	#logger: winston.Logger
	#prefix: string
	#count = 0
}
