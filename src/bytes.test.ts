import { BytesReader, BytesWriter } from './bytes'
import { ClosedError } from './errors'

describe('BytesReader', () => {
	test('read', () => {
		const r = new BytesReader(Uint8Array.from([42, 32, 28]))
		expect(r.remaining).toBe(3)

		{
			const data = new Uint8Array(2)
			expect(r.readSync(data)).toBe(2)
			expect(r.remaining).toBe(1)
			expect(data).toStrictEqual(Uint8Array.from([42, 32]))
		}

		{
			const data = new Uint8Array(2)
			expect(r.readSync(data)).toBe(1)
			expect(r.remaining).toBe(0)
			expect(data[0]).toBe(28)
		}

		expect(r.readSync(new Uint8Array(2))).toBe(0)
	})

	it('reads nothing into an empty buffer', () => {
		const r = new BytesReader(Uint8Array.from([42]))

		expect(r.readSync(new Uint8Array(0))).toBe(0)
		expect(r.remaining).toBe(1)
	})

	it('returns null once closed', async () => {
		const r = new BytesReader(Uint8Array.from([42]))
		r.close()
		expect(r.isClosed).toBe(true)

		expect(r.readSync(new Uint8Array(1))).toBe(null)
		await expect(r.read(new Uint8Array(1))).resolves.toBe(null)
	})
})

describe('BytesWriter', () => {
	test('write', async () => {
		const w = new BytesWriter()

		expect(w.writeSync(Uint8Array.from([42, 32]))).toBe(2)
		await expect(w.write(Uint8Array.from([28, 31, 17]))).resolves.toBe(3)

		expect(w.length).toBe(5)
		expect(w.bytes).toStrictEqual(Uint8Array.from([42, 32, 28, 31, 17]))
	})

	it('returns a copy of the written bytes', () => {
		const w = new BytesWriter()
		w.writeSync(Uint8Array.from([42]))

		const bytes = w.bytes
		bytes[0] = 0
		expect(w.bytes).toStrictEqual(Uint8Array.from([42]))
	})

	it('returns written number of bytes if trying to write more than its limit', () => {
		const w = new BytesWriter(3)

		expect(w.writeSync(Uint8Array.from([42, 32, 28, 31, 17]))).toBe(3)
		expect(w.writeSync(Uint8Array.from([41]))).toBe(0)
		expect(w.bytes).toStrictEqual(Uint8Array.from([42, 32, 28]))
	})

	it('throws ClosedError on write and flush if closed', async () => {
		const w = new BytesWriter()
		w.close()
		expect(w.isClosed).toBe(true)

		expect(() => w.writeSync(Uint8Array.from([42]))).toThrowError(ClosedError)
		await expect(w.write(Uint8Array.from([42]))).rejects.toThrowError(ClosedError)
		expect(() => w.flushSync()).toThrowError(ClosedError)
		await expect(w.flush()).rejects.toThrowError(ClosedError)
	})

	it('can be closed multiple times', () => {
		const w = new BytesWriter()

		w.close()
		w.close()
		expect(w.isClosed).toBe(true)
	})
})
