export type ClassFormatErrorKind = 'UnexpectedEof' | 'InvalidMagic' | 'InvalidConstantTag' | 'InvalidUtf8';

/**
 * The bytes are not a class file we can decode. Fatal for the file being read.
 */
export class ClassFormatError extends Error {
    constructor(public readonly kind: ClassFormatErrorKind, message: string) {
        super(message);
        this.name = 'ClassFormatError';
    }
}

export type ResolutionErrorKind = 'IndexOutOfBounds' | 'WrongEntryKind' | 'Utf8Expected';

/**
 * A constant pool index chain could not be followed.
 */
export class ResolutionError extends Error {
    constructor(public readonly kind: ResolutionErrorKind, public readonly index: number, message: string) {
        super(message);
        this.name = 'ResolutionError';
    }
}

export type BytecodeErrorKind = 'UnknownOpcode' | 'TruncatedInstruction';

/**
 * The code array of a method cannot be walked past `offset`.
 */
export class BytecodeError extends Error {
    constructor(public readonly kind: BytecodeErrorKind, public readonly offset: number, message: string) {
        super(message);
        this.name = 'BytecodeError';
    }
}

/**
 * Bad arguments from the caller, reported before any file is scanned.
 */
export class InputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InputError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
