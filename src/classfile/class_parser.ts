import { ClassFormatError } from '../errors.js';
import { readAttributes, type Attribute } from './attributes.js';
import { ByteReader } from './byte_reader.js';
import { ConstantPool } from './constant_pool.js';

export const CLASS_MAGIC = 0xCAFEBABE;

export interface MemberInfo {
    accessFlags: number;
    nameIndex: number;
    descriptorIndex: number;
    attributes: Attribute[];
}

export type FieldInfo = MemberInfo;
export type MethodInfo = MemberInfo;

export interface ClassFile {
    magic: number;
    minorVersion: number;
    majorVersion: number;
    constantPool: ConstantPool;
    accessFlags: number;
    thisClass: number;
    /** 0 for java.lang.Object and module-info. */
    superClass: number;
    interfaces: number[];
    fields: FieldInfo[];
    methods: MethodInfo[];
    attributes: Attribute[];
}

/**
 * Decodes a complete class file. Pool indices held by the class (this/super,
 * interfaces, member names) are kept as numbers and only checked when
 * something resolves them, so one bad reference does not reject the file.
 */
export class ClassParser {
    private readonly reader: ByteReader;

    constructor(buffer: Uint8Array) {
        this.reader = new ByteReader(buffer);
    }

    public static parse(buffer: Uint8Array): ClassFile {
        const parser = new ClassParser(buffer);
        return parser.parse();
    }

    private parse(): ClassFile {
        const magic = this.reader.readU4();
        if (magic !== CLASS_MAGIC) {
            throw new ClassFormatError('InvalidMagic', `Invalid magic number 0x${magic.toString(16).padStart(8, '0')}`);
        }

        const minorVersion = this.reader.readU2();
        const majorVersion = this.reader.readU2();
        const constantPool = ConstantPool.read(this.reader);

        const accessFlags = this.reader.readU2();
        const thisClass = this.reader.readU2();
        const superClass = this.reader.readU2();

        const interfacesCount = this.reader.readU2();
        const interfaces: number[] = [];
        for (let i = 0; i < interfacesCount; i++) {
            interfaces.push(this.reader.readU2());
        }

        const fields = this.readMembers(constantPool);
        const methods = this.readMembers(constantPool);
        const attributes = readAttributes(this.reader, constantPool);

        return {
            magic,
            minorVersion,
            majorVersion,
            constantPool,
            accessFlags,
            thisClass,
            superClass,
            interfaces,
            fields,
            methods,
            attributes,
        };
    }

    private readMembers(pool: ConstantPool): MemberInfo[] {
        const count = this.reader.readU2();
        const members: MemberInfo[] = [];
        for (let i = 0; i < count; i++) {
            members.push({
                accessFlags: this.reader.readU2(),
                nameIndex: this.reader.readU2(),
                descriptorIndex: this.reader.readU2(),
                attributes: readAttributes(this.reader, pool),
            });
        }
        return members;
    }
}
