import { BytecodeError } from '../errors.js';

export enum Opcode {
    ILOAD = 0x15,
    ALOAD = 0x19,
    ISTORE = 0x36,
    ASTORE = 0x3a,
    IINC = 0x84,
    RET = 0xa9,
    TABLESWITCH = 0xaa,
    LOOKUPSWITCH = 0xab,
    INVOKEVIRTUAL = 0xb6,
    INVOKESPECIAL = 0xb7,
    INVOKESTATIC = 0xb8,
    INVOKEINTERFACE = 0xb9,
    INVOKEDYNAMIC = 0xba,
    WIDE = 0xc4,
}

const VARIABLE = -1;
const UNDEFINED = 0;

/**
 * Total width (opcode included) of every fixed-size instruction; VARIABLE for
 * the switches and `wide`, UNDEFINED for bytes that are not opcodes in a class
 * file (breakpoint, impdep1/2 and the unassigned range).
 */
const WIDTHS: readonly number[] = (() => {
    const widths = new Array<number>(256).fill(UNDEFINED);
    const set = (from: number, to: number, width: number) => widths.fill(width, from, to + 1);

    set(0x00, 0x0f, 1); // nop .. dconst_1
    set(0x10, 0x10, 2); // bipush
    set(0x11, 0x11, 3); // sipush
    set(0x12, 0x12, 2); // ldc
    set(0x13, 0x14, 3); // ldc_w, ldc2_w
    set(0x15, 0x19, 2); // iload .. aload
    set(0x1a, 0x35, 1); // iload_0 .. saload
    set(0x36, 0x3a, 2); // istore .. astore
    set(0x3b, 0x83, 1); // istore_0 .. lxor
    set(0x84, 0x84, 3); // iinc
    set(0x85, 0x98, 1); // i2l .. dcmpg
    set(0x99, 0xa8, 3); // ifeq .. jsr
    set(0xa9, 0xa9, 2); // ret
    set(0xaa, 0xab, VARIABLE);
    set(0xac, 0xb1, 1); // ireturn .. return
    set(0xb2, 0xb8, 3); // getstatic .. invokestatic
    set(0xb9, 0xba, 5); // invokeinterface, invokedynamic
    set(0xbb, 0xbb, 3); // new
    set(0xbc, 0xbc, 2); // newarray
    set(0xbd, 0xbd, 3); // anewarray
    set(0xbe, 0xbf, 1); // arraylength, athrow
    set(0xc0, 0xc1, 3); // checkcast, instanceof
    set(0xc2, 0xc3, 1); // monitorenter, monitorexit
    set(0xc4, 0xc4, VARIABLE);
    set(0xc5, 0xc5, 4); // multianewarray
    set(0xc6, 0xc7, 3); // ifnull, ifnonnull
    set(0xc8, 0xc9, 5); // goto_w, jsr_w
    return widths;
})();

export function isInvoke(opcode: number): boolean {
    return opcode === Opcode.INVOKEVIRTUAL
        || opcode === Opcode.INVOKESPECIAL
        || opcode === Opcode.INVOKESTATIC
        || opcode === Opcode.INVOKEINTERFACE;
}

/**
 * Width in bytes of the instruction starting at `offset`. Switch padding is
 * relative to the start of `code`, which is what the JVM aligns against.
 */
export function instructionLength(code: Uint8Array, offset: number): number {
    const opcode = code[offset];
    const width = WIDTHS[opcode];

    let length: number;
    if (width === UNDEFINED) {
        throw new BytecodeError('UnknownOpcode', offset, `Unknown opcode 0x${opcode.toString(16)} at ${offset}`);
    } else if (width !== VARIABLE) {
        length = width;
    } else if (opcode === Opcode.WIDE) {
        length = wideLength(code, offset);
    } else {
        length = switchLength(code, offset, opcode);
    }

    if (offset + length > code.length) {
        throw new BytecodeError(
            'TruncatedInstruction',
            offset,
            `Instruction 0x${opcode.toString(16)} at ${offset} needs ${length} bytes, code length is ${code.length}`
        );
    }
    return length;
}

function wideLength(code: Uint8Array, offset: number): number {
    if (offset + 1 >= code.length) {
        throw new BytecodeError('TruncatedInstruction', offset, `wide at ${offset} has no operand opcode`);
    }
    const modified = code[offset + 1];
    if (modified === Opcode.IINC) return 6;
    if ((modified >= Opcode.ILOAD && modified <= Opcode.ALOAD)
        || (modified >= Opcode.ISTORE && modified <= Opcode.ASTORE)
        || modified === Opcode.RET) {
        return 4;
    }
    throw new BytecodeError('UnknownOpcode', offset, `wide cannot modify opcode 0x${modified.toString(16)} at ${offset}`);
}

function switchLength(code: Uint8Array, offset: number, opcode: number): number {
    const padding = (4 - ((offset + 1) % 4)) % 4;
    const fixed = offset + 1 + padding;
    const headerSize = opcode === Opcode.TABLESWITCH ? 12 : 8;
    if (fixed + headerSize > code.length) {
        throw new BytecodeError('TruncatedInstruction', offset, `Switch header at ${offset} runs past the end of the code`);
    }

    const view = new DataView(code.buffer, code.byteOffset, code.byteLength);
    if (opcode === Opcode.TABLESWITCH) {
        const low = view.getInt32(fixed + 4);
        const high = view.getInt32(fixed + 8);
        if (high < low) {
            throw new BytecodeError('TruncatedInstruction', offset, `tableswitch at ${offset} has high ${high} < low ${low}`);
        }
        return 1 + padding + 12 + 4 * (high - low + 1);
    }

    const pairs = view.getInt32(fixed + 4);
    if (pairs < 0) {
        throw new BytecodeError('TruncatedInstruction', offset, `lookupswitch at ${offset} has negative pair count ${pairs}`);
    }
    return 1 + padding + 8 + 8 * pairs;
}
