import { ByteWriter, CorruptStreamError } from '@pixel-codec/core'

/**
 * Reads bits LSB first from a byte stream
 */
export class BitReader {
	private pos: number
	private bitBuf = 0
	private bitCount = 0

	constructor(
		private readonly data: Uint8Array,
		offset = 0
	) {
		this.pos = offset
	}

	/**
	 * Read n bits (n <= 16)
	 */
	bits(n: number): number {
		while (this.bitCount < n) {
			if (this.pos >= this.data.length) {
				throw new CorruptStreamError('Unexpected end of deflate stream')
			}
			this.bitBuf |= this.data[this.pos++] << this.bitCount
			this.bitCount += 8
		}
		const value = this.bitBuf & ((1 << n) - 1)
		this.bitBuf >>>= n
		this.bitCount -= n
		return value
	}

	/**
	 * Drop the rest of the current byte
	 */
	alignToByte(): void {
		this.bitBuf = 0
		this.bitCount = 0
	}

	/**
	 * Byte offset of the next unread byte (only meaningful when aligned)
	 */
	get offset(): number {
		return this.pos
	}

	/**
	 * Read whole bytes after alignment
	 */
	bytes(n: number): Uint8Array {
		if (this.pos + n > this.data.length) {
			throw new CorruptStreamError('Unexpected end of stored block')
		}
		const view = this.data.subarray(this.pos, this.pos + n)
		this.pos += n
		return view
	}
}

/**
 * Writes bits LSB first
 */
export class BitWriter {
	private readonly out: ByteWriter
	private bitBuf = 0
	private bitCount = 0

	constructor(initialCapacity?: number) {
		this.out = new ByteWriter(initialCapacity)
	}

	/**
	 * Bits written so far
	 */
	get bitLength(): number {
		return this.out.length * 8 + this.bitCount
	}

	/**
	 * Write n bits (n <= 16)
	 */
	bits(value: number, n: number): void {
		this.bitBuf |= (value & ((1 << n) - 1)) << this.bitCount
		this.bitCount += n
		while (this.bitCount >= 8) {
			this.out.u8(this.bitBuf & 0xff)
			this.bitBuf >>>= 8
			this.bitCount -= 8
		}
	}

	/**
	 * Pad with zero bits to the next byte boundary
	 */
	alignToByte(): void {
		if (this.bitCount > 0) {
			this.out.u8(this.bitBuf & 0xff)
			this.bitBuf = 0
			this.bitCount = 0
		}
	}

	bytes(data: Uint8Array): void {
		this.alignToByte()
		this.out.bytes(data)
	}

	u16le(value: number): void {
		this.alignToByte()
		this.out.u16le(value)
	}

	finish(): Uint8Array {
		this.alignToByte()
		return this.out.toBytes()
	}
}
