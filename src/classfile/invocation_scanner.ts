import { BytecodeError, ResolutionError } from '../errors.js';
import { findCode, lineNumbers, type CodeAttribute, type LineNumberEntry } from './attributes.js';
import type { ClassFile } from './class_parser.js';
import type { ConstantPool } from './constant_pool.js';
import { instructionLength, isInvoke } from './opcodes.js';
import { resolveClassName, resolveMethodRef, resolveUtf8, type MethodRef } from './resolver.js';

export interface MethodTarget {
    /** Dotted class name. */
    className: string;
    methodName: string;
}

export interface InvocationMatch {
    className: string;
    methodName: string;
    lineNumber: number | null;
}

export interface Instruction {
    offset: number;
    opcode: number;
    length: number;
}

export interface InvocationSite {
    offset: number;
    opcode: number;
    method: MethodRef;
}

export interface MethodWarning {
    /** `Class#method`, as far as the names could be resolved. */
    method: string;
    message: string;
}

export interface ClassScanResult {
    className: string;
    matches: InvocationMatch[];
    warnings: MethodWarning[];
}

export interface ClassScanOptions {
    /** Also scan the target class's own methods. Off by default. */
    includeTargetClass?: boolean;
}

/**
 * Walks a code array instruction by instruction. Throws BytecodeError on the
 * first instruction that cannot be decoded; everything yielded before that is valid.
 */
export function* instructions(code: Uint8Array): Generator<Instruction> {
    let offset = 0;
    while (offset < code.length) {
        const length = instructionLength(code, offset);
        yield { offset, opcode: code[offset], length };
        offset += length;
    }
}

/**
 * All invoke{virtual,special,static,interface} sites whose method reference
 * resolves. Unresolvable operands are skipped.
 */
export function invocationSites(code: Uint8Array, pool: ConstantPool): InvocationSite[] {
    const sites: InvocationSite[] = [];
    for (const insn of instructions(code)) {
        if (!isInvoke(insn.opcode)) continue;
        const index = (code[insn.offset + 1] << 8) | code[insn.offset + 2];
        try {
            sites.push({ offset: insn.offset, opcode: insn.opcode, method: resolveMethodRef(pool, index) });
        } catch (e) {
            if (!(e instanceof ResolutionError)) throw e;
        }
    }
    return sites;
}

/**
 * Line of the entry with the greatest start_pc not after `offset`. Null when
 * there is no table or the offset precedes every entry.
 */
export function lineNumberAt(table: readonly LineNumberEntry[] | undefined, offset: number): number | null {
    if (!table) return null;
    let best: LineNumberEntry | null = null;
    for (const entry of table) {
        if (entry.startPc <= offset && (best === null || entry.startPc >= best.startPc)) {
            best = entry;
        }
    }
    return best ? best.lineNumber : null;
}

/**
 * Matching calls inside one method body. Overloads are not told apart: only
 * the owner class and the method name are compared.
 */
export function findInvocations(
    code: CodeAttribute,
    pool: ConstantPool,
    target: MethodTarget,
    caller: { className: string; methodName: string }
): InvocationMatch[] {
    const table = lineNumbers(code);
    return invocationSites(code.code, pool)
        .filter(site => site.method.className === target.className && site.method.methodName === target.methodName)
        .map(site => ({
            className: caller.className,
            methodName: caller.methodName,
            lineNumber: lineNumberAt(table, site.offset),
        }));
}

/**
 * Scans every method of a class. A method whose bytecode cannot be walked, or
 * whose name cannot be resolved, is reported as a warning and the rest of the
 * class is still scanned. An unresolvable class name throws.
 */
export function scanClass(classFile: ClassFile, target: MethodTarget, options: ClassScanOptions = {}): ClassScanResult {
    const pool = classFile.constantPool;
    const className = resolveClassName(pool, classFile.thisClass);
    const result: ClassScanResult = { className, matches: [], warnings: [] };

    if (className === target.className && !options.includeTargetClass) {
        return result;
    }

    for (const method of classFile.methods) {
        const code = findCode(method.attributes);
        if (!code) continue;

        let methodName: string;
        try {
            methodName = resolveUtf8(pool, method.nameIndex);
        } catch (e) {
            if (!(e instanceof ResolutionError)) throw e;
            result.warnings.push({ method: `${className}#<#${method.nameIndex}>`, message: e.message });
            continue;
        }

        try {
            result.matches.push(...findInvocations(code, pool, target, { className, methodName }));
        } catch (e) {
            if (!(e instanceof BytecodeError)) throw e;
            result.warnings.push({ method: `${className}#${methodName}`, message: e.message });
        }
    }
    return result;
}
