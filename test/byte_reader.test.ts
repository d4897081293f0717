import { describe, it, expect } from 'vitest';
import { ByteReader, decodeModifiedUtf8 } from '../src/classfile/byte_reader.js';
import { ClassFormatError } from '../src/errors.js';

function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error('expected an error');
}

describe('ByteReader', () => {
    it('should read big-endian values and advance by their width', () => {
        const reader = new ByteReader(Uint8Array.from([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07]));

        expect(reader.readU1()).toBe(1);
        expect(reader.position).toBe(1);
        expect(reader.readU2()).toBe(0x0203);
        expect(reader.position).toBe(3);
        expect(reader.readU4()).toBe(0x04050607);
        expect(reader.position).toBe(7);
        expect(reader.remaining).toBe(0);
    });

    it('should read u4 values above the signed range', () => {
        const reader = new ByteReader(Uint8Array.from([0xca, 0xfe, 0xba, 0xbe]));
        expect(reader.readU4()).toBe(0xCAFEBABE);
    });

    it('should read signed and floating point values', () => {
        const buf = Buffer.alloc(24);
        buf.writeInt32BE(-2, 0);
        buf.writeBigInt64BE(-5n, 4);
        buf.writeFloatBE(1.5, 12);
        buf.writeDoubleBE(-0.25, 16);
        const reader = new ByteReader(buf);

        expect(reader.readI4()).toBe(-2);
        expect(reader.readI8()).toBe(-5n);
        expect(reader.readF4()).toBe(1.5);
        expect(reader.readF8()).toBe(-0.25);
    });

    it('should return slices and skip bytes', () => {
        const reader = new ByteReader(Uint8Array.from([1, 2, 3, 4, 5]));
        reader.skip(1);
        expect([...reader.readBytes(3)]).toEqual([2, 3, 4]);
        expect(reader.remaining).toBe(1);
    });

    it('should fail with UnexpectedEof instead of reading past the end', () => {
        const reader = new ByteReader(Uint8Array.from([1, 2, 3]));

        const error = catchError(() => reader.readU4());
        expect(error).toBeInstanceOf(ClassFormatError);
        expect(error).toMatchObject({
            kind: 'UnexpectedEof',
            message: 'Unexpected end of data: needed 4 bytes at offset 0, 3 left',
        });
        // A failed read leaves the cursor where it was
        expect(reader.position).toBe(0);

        reader.skip(3);
        expect(() => reader.readU1()).toThrow(ClassFormatError);
        expect(() => reader.readBytes(1)).toThrow(ClassFormatError);
        expect(() => reader.skip(1)).toThrow(ClassFormatError);
    });

    it('should respect the bounds of a sub-array view', () => {
        const backing = Uint8Array.from([9, 9, 0x00, 0x2a, 9, 9]);
        const reader = new ByteReader(backing.subarray(2, 4));
        expect(reader.readU2()).toBe(42);
        expect(() => reader.readU1()).toThrow(ClassFormatError);
    });
});

describe('decodeModifiedUtf8', () => {
    it('should decode ASCII and multi-byte characters', () => {
        expect(decodeModifiedUtf8(Uint8Array.from([0x48, 0x69]))).toBe('Hi');
        expect(decodeModifiedUtf8(Uint8Array.from([0xc3, 0xa9]))).toBe('é');
        expect(decodeModifiedUtf8(Uint8Array.from([0xe2, 0x82, 0xac]))).toBe('€');
    });

    it('should decode the two-byte NUL form', () => {
        expect(decodeModifiedUtf8(Uint8Array.from([0x61, 0xc0, 0x80, 0x62]))).toBe('a\u0000b');
    });

    it('should decode supplementary characters written as surrogate pairs', () => {
        const bytes = Uint8Array.from([0xed, 0xa0, 0xbd, 0xed, 0xb8, 0x80]);
        expect(decodeModifiedUtf8(bytes)).toBe('😀');
    });

    it('should reject bytes that are not modified UTF-8', () => {
        expect(catchError(() => decodeModifiedUtf8(Uint8Array.from([0x00])))).toMatchObject({ kind: 'InvalidUtf8' });
        expect(catchError(() => decodeModifiedUtf8(Uint8Array.from([0xc3])))).toMatchObject({ kind: 'InvalidUtf8' });
        expect(catchError(() => decodeModifiedUtf8(Uint8Array.from([0xc3, 0x41])))).toMatchObject({ kind: 'InvalidUtf8' });
        expect(catchError(() => decodeModifiedUtf8(Uint8Array.from([0xf0, 0x9f, 0x98, 0x80])))).toMatchObject({ kind: 'InvalidUtf8' });
    });
});
