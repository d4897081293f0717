import { ClassFormatError } from '../errors.js';

/**
 * Big-endian cursor over the bytes of a class file (or one of its attributes).
 * Every read is bounds-checked and advances the cursor by exactly its width.
 */
export class ByteReader {
    private readonly buffer: Buffer;
    private offset: number = 0;

    constructor(data: Uint8Array) {
        this.buffer = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    }

    public get position(): number {
        return this.offset;
    }

    public get remaining(): number {
        return this.buffer.length - this.offset;
    }

    public readU1(): number {
        this.ensure(1);
        const val = this.buffer.readUInt8(this.offset);
        this.offset += 1;
        return val;
    }

    public readU2(): number {
        this.ensure(2);
        const val = this.buffer.readUInt16BE(this.offset);
        this.offset += 2;
        return val;
    }

    public readU4(): number {
        this.ensure(4);
        const val = this.buffer.readUInt32BE(this.offset);
        this.offset += 4;
        return val;
    }

    public readI4(): number {
        this.ensure(4);
        const val = this.buffer.readInt32BE(this.offset);
        this.offset += 4;
        return val;
    }

    public readI8(): bigint {
        this.ensure(8);
        const val = this.buffer.readBigInt64BE(this.offset);
        this.offset += 8;
        return val;
    }

    public readF4(): number {
        this.ensure(4);
        const val = this.buffer.readFloatBE(this.offset);
        this.offset += 4;
        return val;
    }

    public readF8(): number {
        this.ensure(8);
        const val = this.buffer.readDoubleBE(this.offset);
        this.offset += 8;
        return val;
    }

    /**
     * Returns a view (not a copy) of the next `length` bytes.
     */
    public readBytes(length: number): Buffer {
        this.ensure(length);
        const slice = this.buffer.subarray(this.offset, this.offset + length);
        this.offset += length;
        return slice;
    }

    public skip(length: number): void {
        this.ensure(length);
        this.offset += length;
    }

    private ensure(width: number): void {
        if (width < 0 || width > this.remaining) {
            throw new ClassFormatError(
                'UnexpectedEof',
                `Unexpected end of data: needed ${width} bytes at offset ${this.offset}, ${this.remaining} left`
            );
        }
    }
}

/**
 * Decodes the "modified UTF-8" used by CONSTANT_Utf8_info. NUL is encoded as
 * 0xC0 0x80 and supplementary characters as two 3-byte surrogates, which map
 * straight onto UTF-16 code units.
 */
export function decodeModifiedUtf8(bytes: Uint8Array): string {
    const units: number[] = [];
    for (let i = 0; i < bytes.length; i++) {
        const x = bytes[i];
        if (x === 0 || x >= 0xf0) {
            throw new ClassFormatError('InvalidUtf8', `Invalid modified UTF-8 lead byte 0x${x.toString(16)} at ${i}`);
        }
        if (x < 0x80) {
            units.push(x);
            continue;
        }
        if ((x & 0xe0) === 0xc0) {
            const y = continuation(bytes, ++i);
            units.push(((x & 0x1f) << 6) | y);
            continue;
        }
        if ((x & 0xf0) === 0xe0) {
            const y = continuation(bytes, ++i);
            const z = continuation(bytes, ++i);
            units.push(((x & 0x0f) << 12) | (y << 6) | z);
            continue;
        }
        throw new ClassFormatError('InvalidUtf8', `Invalid modified UTF-8 lead byte 0x${x.toString(16)} at ${i}`);
    }

    let out = '';
    for (let i = 0; i < units.length; i += 4096) {
        out += String.fromCharCode(...units.slice(i, i + 4096));
    }
    return out;
}

function continuation(bytes: Uint8Array, index: number): number {
    if (index >= bytes.length) {
        throw new ClassFormatError('InvalidUtf8', 'Truncated modified UTF-8 sequence');
    }
    const b = bytes[index];
    if ((b & 0xc0) !== 0x80) {
        throw new ClassFormatError('InvalidUtf8', `Invalid continuation byte 0x${b.toString(16)} at ${index}`);
    }
    return b & 0x3f;
}
