import { ResolutionError } from '../errors.js';
import { ConstantTag, type ConstantPool, type ConstantPoolEntry } from './constant_pool.js';

export interface MethodRef {
    /** Dotted binary name, e.g. `com.example.Outer$Inner`. */
    className: string;
    methodName: string;
    descriptor: string;
}

export function toDottedName(internalName: string): string {
    return internalName.replace(/\//g, '.');
}

function entryAt(pool: ConstantPool, index: number): ConstantPoolEntry {
    const entry = pool.get(index);
    if (!entry) {
        throw new ResolutionError('IndexOutOfBounds', index, `Constant pool index ${index} is not addressable (pool count ${pool.count})`);
    }
    return entry;
}

export function resolveUtf8(pool: ConstantPool, index: number): string {
    const entry = entryAt(pool, index);
    if (entry.tag !== ConstantTag.Utf8) {
        throw new ResolutionError('Utf8Expected', index, `Expected Utf8 at #${index}, found ${ConstantTag[entry.tag]}`);
    }
    return entry.value;
}

/**
 * Resolves a CONSTANT_Class entry to its dotted name.
 */
export function resolveClassName(pool: ConstantPool, index: number): string {
    const entry = entryAt(pool, index);
    if (entry.tag !== ConstantTag.Class) {
        throw new ResolutionError('WrongEntryKind', index, `Expected Class at #${index}, found ${ConstantTag[entry.tag]}`);
    }
    return toDottedName(resolveUtf8(pool, entry.nameIndex));
}

/**
 * Follows Methodref/InterfaceMethodref → Class + NameAndType → Utf8.
 * Both kinds resolve the same way regardless of which invoke opcode uses them.
 */
export function resolveMethodRef(pool: ConstantPool, index: number): MethodRef {
    const entry = entryAt(pool, index);
    if (entry.tag !== ConstantTag.Methodref && entry.tag !== ConstantTag.InterfaceMethodref) {
        throw new ResolutionError('WrongEntryKind', index, `Expected a method reference at #${index}, found ${ConstantTag[entry.tag]}`);
    }

    const className = resolveClassName(pool, entry.classIndex);

    const nameAndType = entryAt(pool, entry.nameAndTypeIndex);
    if (nameAndType.tag !== ConstantTag.NameAndType) {
        throw new ResolutionError(
            'WrongEntryKind',
            entry.nameAndTypeIndex,
            `Expected NameAndType at #${entry.nameAndTypeIndex}, found ${ConstantTag[nameAndType.tag]}`
        );
    }

    return {
        className,
        methodName: resolveUtf8(pool, nameAndType.nameIndex),
        descriptor: resolveUtf8(pool, nameAndType.descriptorIndex),
    };
}
