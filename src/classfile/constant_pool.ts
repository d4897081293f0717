import { ClassFormatError } from '../errors.js';
import { decodeModifiedUtf8, type ByteReader } from './byte_reader.js';

export enum ConstantTag {
    Utf8 = 1,
    Integer = 3,
    Float = 4,
    Long = 5,
    Double = 6,
    Class = 7,
    String = 8,
    Fieldref = 9,
    Methodref = 10,
    InterfaceMethodref = 11,
    NameAndType = 12,
    MethodHandle = 15,
    MethodType = 16,
    Dynamic = 17,
    InvokeDynamic = 18,
    Module = 19,
    Package = 20,
}

export interface Utf8Constant {
    tag: ConstantTag.Utf8;
    value: string;
}

export interface NumericConstant<Tag extends ConstantTag, T> {
    tag: Tag;
    value: T;
}

export interface ClassConstant {
    tag: ConstantTag.Class;
    nameIndex: number;
}

export interface StringConstant {
    tag: ConstantTag.String;
    utf8Index: number;
}

export interface MemberRefConstant<Tag extends ConstantTag.Fieldref | ConstantTag.Methodref | ConstantTag.InterfaceMethodref> {
    tag: Tag;
    classIndex: number;
    nameAndTypeIndex: number;
}

export type FieldRefConstant = MemberRefConstant<ConstantTag.Fieldref>;
export type MethodRefConstant = MemberRefConstant<ConstantTag.Methodref>;
export type InterfaceMethodRefConstant = MemberRefConstant<ConstantTag.InterfaceMethodref>;

export interface NameAndTypeConstant {
    tag: ConstantTag.NameAndType;
    nameIndex: number;
    descriptorIndex: number;
}

export interface MethodHandleConstant {
    tag: ConstantTag.MethodHandle;
    referenceKind: number;
    referenceIndex: number;
}

export interface MethodTypeConstant {
    tag: ConstantTag.MethodType;
    descriptorIndex: number;
}

export interface DynamicConstant<Tag extends ConstantTag.Dynamic | ConstantTag.InvokeDynamic> {
    tag: Tag;
    bootstrapMethodAttrIndex: number;
    nameAndTypeIndex: number;
}

export interface NamedConstant<Tag extends ConstantTag.Module | ConstantTag.Package> {
    tag: Tag;
    nameIndex: number;
}

export type ConstantPoolEntry =
    | Utf8Constant
    | NumericConstant<ConstantTag.Integer, number>
    | NumericConstant<ConstantTag.Float, number>
    | NumericConstant<ConstantTag.Long, bigint>
    | NumericConstant<ConstantTag.Double, number>
    | ClassConstant
    | StringConstant
    | FieldRefConstant
    | MethodRefConstant
    | InterfaceMethodRefConstant
    | NameAndTypeConstant
    | MethodHandleConstant
    | MethodTypeConstant
    | DynamicConstant<ConstantTag.Dynamic>
    | DynamicConstant<ConstantTag.InvokeDynamic>
    | NamedConstant<ConstantTag.Module>
    | NamedConstant<ConstantTag.Package>;

/**
 * The 1-indexed constant pool of a class. Slot 0 and the slot after every
 * Long/Double entry hold nothing and cannot be addressed.
 */
export class ConstantPool {
    private constructor(private readonly slots: ReadonlyArray<ConstantPoolEntry | undefined>) {}

    /**
     * The `constant_pool_count` from the class file: one more than the highest valid index.
     */
    public get count(): number {
        return this.slots.length;
    }

    public get(index: number): ConstantPoolEntry | undefined {
        if (!Number.isInteger(index) || index < 1 || index >= this.slots.length) {
            return undefined;
        }
        return this.slots[index];
    }

    public isAddressable(index: number): boolean {
        return this.get(index) !== undefined;
    }

    public static read(reader: ByteReader): ConstantPool {
        const count = reader.readU2();
        const slots = new Array<ConstantPoolEntry | undefined>(count).fill(undefined);

        for (let i = 1; i < count; i++) {
            const entry = readEntry(reader);
            slots[i] = entry;
            if (entry.tag === ConstantTag.Long || entry.tag === ConstantTag.Double) {
                // Takes two slots
                i++;
            }
        }
        return new ConstantPool(slots);
    }
}

function readEntry(reader: ByteReader): ConstantPoolEntry {
    const at = reader.position;
    const tag = reader.readU1();
    switch (tag) {
        case ConstantTag.Utf8: {
            const length = reader.readU2();
            return { tag: ConstantTag.Utf8, value: decodeModifiedUtf8(reader.readBytes(length)) };
        }
        case ConstantTag.Integer:
            return { tag: ConstantTag.Integer, value: reader.readI4() };
        case ConstantTag.Float:
            return { tag: ConstantTag.Float, value: reader.readF4() };
        case ConstantTag.Long:
            return { tag: ConstantTag.Long, value: reader.readI8() };
        case ConstantTag.Double:
            return { tag: ConstantTag.Double, value: reader.readF8() };
        case ConstantTag.Class:
            return { tag: ConstantTag.Class, nameIndex: reader.readU2() };
        case ConstantTag.String:
            return { tag: ConstantTag.String, utf8Index: reader.readU2() };
        case ConstantTag.Fieldref:
            return { tag: ConstantTag.Fieldref, classIndex: reader.readU2(), nameAndTypeIndex: reader.readU2() };
        case ConstantTag.Methodref:
            return { tag: ConstantTag.Methodref, classIndex: reader.readU2(), nameAndTypeIndex: reader.readU2() };
        case ConstantTag.InterfaceMethodref:
            return { tag: ConstantTag.InterfaceMethodref, classIndex: reader.readU2(), nameAndTypeIndex: reader.readU2() };
        case ConstantTag.NameAndType:
            return { tag: ConstantTag.NameAndType, nameIndex: reader.readU2(), descriptorIndex: reader.readU2() };
        case ConstantTag.MethodHandle:
            return { tag: ConstantTag.MethodHandle, referenceKind: reader.readU1(), referenceIndex: reader.readU2() };
        case ConstantTag.MethodType:
            return { tag: ConstantTag.MethodType, descriptorIndex: reader.readU2() };
        case ConstantTag.Dynamic:
            return { tag: ConstantTag.Dynamic, bootstrapMethodAttrIndex: reader.readU2(), nameAndTypeIndex: reader.readU2() };
        case ConstantTag.InvokeDynamic:
            return { tag: ConstantTag.InvokeDynamic, bootstrapMethodAttrIndex: reader.readU2(), nameAndTypeIndex: reader.readU2() };
        case ConstantTag.Module:
            return { tag: ConstantTag.Module, nameIndex: reader.readU2() };
        case ConstantTag.Package:
            return { tag: ConstantTag.Package, nameIndex: reader.readU2() };
        default:
            throw new ClassFormatError('InvalidConstantTag', `Unknown constant pool tag: ${tag} at offset ${at}`);
    }
}
