import { CorruptStreamError } from './errors'

/**
 * Sequential reader over a byte array. Every read is bounds checked and a
 * short read raises CorruptStreamError naming the structure being parsed.
 */
export class ByteReader {
	private pos: number

	constructor(
		readonly data: Uint8Array,
		offset = 0,
		readonly label = 'stream'
	) {
		this.pos = offset
	}

	get position(): number {
		return this.pos
	}

	get remaining(): number {
		return this.data.length - this.pos
	}

	seek(position: number): void {
		if (position < 0 || position > this.data.length) {
			throw new CorruptStreamError(`Truncated ${this.label}: offset ${position} out of range`)
		}
		this.pos = position
	}

	skip(count: number): void {
		this.ensure(count)
		this.pos += count
	}

	u8(): number {
		this.ensure(1)
		return this.data[this.pos++]
	}

	u16le(): number {
		this.ensure(2)
		const v = this.data[this.pos] | (this.data[this.pos + 1] << 8)
		this.pos += 2
		return v
	}

	i16le(): number {
		const v = this.u16le()
		return v >= 0x8000 ? v - 0x10000 : v
	}

	u32le(): number {
		this.ensure(4)
		const d = this.data
		const p = this.pos
		this.pos += 4
		return (d[p] | (d[p + 1] << 8) | (d[p + 2] << 16) | (d[p + 3] << 24)) >>> 0
	}

	u16be(): number {
		this.ensure(2)
		const v = (this.data[this.pos] << 8) | this.data[this.pos + 1]
		this.pos += 2
		return v
	}

	u32be(): number {
		this.ensure(4)
		const d = this.data
		const p = this.pos
		this.pos += 4
		return ((d[p] << 24) | (d[p + 1] << 16) | (d[p + 2] << 8) | d[p + 3]) >>> 0
	}

	/**
	 * View (not copy) of the next `count` bytes
	 */
	bytes(count: number): Uint8Array {
		this.ensure(count)
		const view = this.data.subarray(this.pos, this.pos + count)
		this.pos += count
		return view
	}

	ascii(count: number): string {
		return String.fromCharCode(...this.bytes(count))
	}

	private ensure(count: number): void {
		if (count < 0 || this.pos + count > this.data.length) {
			throw new CorruptStreamError(`Truncated ${this.label}`, {
				metadata: { offset: this.pos, wanted: count, length: this.data.length },
			})
		}
	}
}

/**
 * Growable byte sink
 */
export class ByteWriter {
	private buffer: Uint8Array
	private size = 0

	constructor(initialCapacity = 1024) {
		this.buffer = new Uint8Array(Math.max(16, initialCapacity))
	}

	get length(): number {
		return this.size
	}

	u8(value: number): this {
		this.reserve(1)
		this.buffer[this.size++] = value & 0xff
		return this
	}

	u16le(value: number): this {
		this.reserve(2)
		this.buffer[this.size++] = value & 0xff
		this.buffer[this.size++] = (value >> 8) & 0xff
		return this
	}

	u32le(value: number): this {
		this.reserve(4)
		this.buffer[this.size++] = value & 0xff
		this.buffer[this.size++] = (value >> 8) & 0xff
		this.buffer[this.size++] = (value >> 16) & 0xff
		this.buffer[this.size++] = (value >>> 24) & 0xff
		return this
	}

	u16be(value: number): this {
		this.reserve(2)
		this.buffer[this.size++] = (value >> 8) & 0xff
		this.buffer[this.size++] = value & 0xff
		return this
	}

	u32be(value: number): this {
		this.reserve(4)
		this.buffer[this.size++] = (value >>> 24) & 0xff
		this.buffer[this.size++] = (value >> 16) & 0xff
		this.buffer[this.size++] = (value >> 8) & 0xff
		this.buffer[this.size++] = value & 0xff
		return this
	}

	bytes(data: Uint8Array): this {
		this.reserve(data.length)
		this.buffer.set(data, this.size)
		this.size += data.length
		return this
	}

	ascii(text: string): this {
		this.reserve(text.length)
		for (let i = 0; i < text.length; i++) {
			this.buffer[this.size++] = text.charCodeAt(i) & 0xff
		}
		return this
	}

	/**
	 * Copy of the written bytes
	 */
	toBytes(): Uint8Array {
		return this.buffer.slice(0, this.size)
	}

	private reserve(count: number): void {
		if (this.size + count <= this.buffer.length) return
		let capacity = this.buffer.length * 2
		while (capacity < this.size + count) capacity *= 2
		const next = new Uint8Array(capacity)
		next.set(this.buffer.subarray(0, this.size))
		this.buffer = next
	}
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
	let total = 0
	for (const part of parts) total += part.length
	const out = new Uint8Array(total)
	let offset = 0
	for (const part of parts) {
		out.set(part, offset)
		offset += part.length
	}
	return out
}
