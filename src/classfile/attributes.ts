import { ByteReader } from './byte_reader.js';
import { ConstantTag, type ConstantPool } from './constant_pool.js';

export interface ExceptionTableEntry {
    startPc: number;
    endPc: number;
    handlerPc: number;
    /** Pool index of the caught class, 0 for `finally` handlers. Not interpreted. */
    catchType: number;
}

export interface LineNumberEntry {
    startPc: number;
    lineNumber: number;
}

export interface CodeAttribute {
    kind: 'Code';
    nameIndex: number;
    maxStack: number;
    maxLocals: number;
    code: Buffer;
    exceptionTable: ExceptionTableEntry[];
    attributes: Attribute[];
}

export interface LineNumberTableAttribute {
    kind: 'LineNumberTable';
    nameIndex: number;
    entries: LineNumberEntry[];
}

/**
 * Any other attribute, kept as raw bytes. `name` is null when the name index
 * does not point at a Utf8 constant.
 */
export interface OpaqueAttribute {
    kind: 'Opaque';
    nameIndex: number;
    name: string | null;
    data: Buffer;
}

export type Attribute = CodeAttribute | LineNumberTableAttribute | OpaqueAttribute;

export function readAttributes(reader: ByteReader, pool: ConstantPool): Attribute[] {
    const count = reader.readU2();
    const attributes: Attribute[] = [];
    for (let i = 0; i < count; i++) {
        attributes.push(readAttribute(reader, pool));
    }
    return attributes;
}

function readAttribute(reader: ByteReader, pool: ConstantPool): Attribute {
    const nameIndex = reader.readU2();
    const length = reader.readU4();
    const data = reader.readBytes(length);

    const nameEntry = pool.get(nameIndex);
    const name = nameEntry?.tag === ConstantTag.Utf8 ? nameEntry.value : null;

    switch (name) {
        case 'Code':
            return parseCodeAttribute(nameIndex, data, pool);
        case 'LineNumberTable':
            return parseLineNumberTable(nameIndex, data);
        default:
            return { kind: 'Opaque', nameIndex, name, data };
    }
}

/**
 * Decodes a `Code` attribute payload. Nested attributes go through the same
 * generic reader, which is how a method's LineNumberTable is found.
 */
function parseCodeAttribute(nameIndex: number, data: Buffer, pool: ConstantPool): CodeAttribute {
    const reader = new ByteReader(data);
    const maxStack = reader.readU2();
    const maxLocals = reader.readU2();
    const codeLength = reader.readU4();
    const code = reader.readBytes(codeLength);

    const exceptionTableLength = reader.readU2();
    const exceptionTable: ExceptionTableEntry[] = [];
    for (let i = 0; i < exceptionTableLength; i++) {
        exceptionTable.push({
            startPc: reader.readU2(),
            endPc: reader.readU2(),
            handlerPc: reader.readU2(),
            catchType: reader.readU2(),
        });
    }

    const attributes = readAttributes(reader, pool);
    return { kind: 'Code', nameIndex, maxStack, maxLocals, code, exceptionTable, attributes };
}

/**
 * Entries are returned in file order; javac writes them ascending by start_pc
 * but nothing here relies on it.
 */
function parseLineNumberTable(nameIndex: number, data: Buffer): LineNumberTableAttribute {
    const reader = new ByteReader(data);
    const length = reader.readU2();
    const entries: LineNumberEntry[] = [];
    for (let i = 0; i < length; i++) {
        entries.push({ startPc: reader.readU2(), lineNumber: reader.readU2() });
    }
    return { kind: 'LineNumberTable', nameIndex, entries };
}

export function findCode(attributes: readonly Attribute[]): CodeAttribute | undefined {
    for (const attribute of attributes) {
        if (attribute.kind === 'Code') return attribute;
    }
    return undefined;
}

/**
 * All LineNumberTable entries of a method, or undefined when it was compiled
 * without line information. A Code attribute may carry several tables.
 */
export function lineNumbers(code: CodeAttribute): LineNumberEntry[] | undefined {
    const tables = code.attributes.filter((a): a is LineNumberTableAttribute => a.kind === 'LineNumberTable');
    if (tables.length === 0) return undefined;
    return tables.flatMap(t => t.entries);
}
