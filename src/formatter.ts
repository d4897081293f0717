import type { InvocationMatch } from './classfile/invocation_scanner.js';
import type { ScanResult, ScanWarning } from './scanner.js';

export type OutputFormat = 'txt' | 'json';

export const OUTPUT_FORMATS = ['txt', 'json'] as const satisfies readonly OutputFormat[];

export function formatMatch(match: InvocationMatch): string {
    const line = match.lineNumber === null ? '' : ` (L${match.lineNumber})`;
    return `${match.className}#${match.methodName}${line}`;
}

export function toText(result: Pick<ScanResult, 'target' | 'matches'>): string {
    const output = [result.target];
    if (result.matches.length === 0) {
        output.push('No results');
    } else {
        output.push(...result.matches.map(match => ` - ${formatMatch(match)}`));
    }
    return output.join('\n');
}

export function toJson(result: Pick<ScanResult, 'target' | 'matches'>): string {
    return JSON.stringify({
        target: result.target,
        calls: result.matches.map(match => ({
            class_name: match.className,
            method_name: match.methodName,
            line_number: match.lineNumber,
        })),
    }, null, 2);
}

export function formatResult(result: Pick<ScanResult, 'target' | 'matches'>, format: OutputFormat): string {
    return format === 'json' ? toJson(result) : toText(result);
}

export function formatWarnings(warnings: readonly ScanWarning[]): string {
    return warnings.map(w => `${w.file}: ${w.message}`).join('\n');
}
