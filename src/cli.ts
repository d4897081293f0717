import { parseArgs } from 'util';
import { z } from 'zod';
import type { Config } from './config.js';
import { InputError, errorMessage } from './errors.js';
import { OUTPUT_FORMATS, type OutputFormat } from './formatter.js';
import type { ScanRequest } from './scanner.js';

export const USAGE = `Usage: jmf -c <class> -m <method> [options]

Find every call site of a method in compiled Java classes.

Options:
  -c, --class <name>     Fully qualified target class (e.g. java.lang.String)
  -m, --method <name>    Target method name (all overloads match)
  -s, --scan <folder>    Folder to scan (default: from pom.xml/build.gradle, else ./target/classes)
  -f, --format <fmt>     Output format: txt or json (default: txt)
  -j, --jobs <n>         Files analyzed concurrently
      --jars             Also scan .jar files found in the folder
      --include-self     Report calls made from inside the target class
  -w, --watch            Rescan whenever class files change
      --mcp              Run as an MCP server on stdio
  -v, --verbose          Debug logging on stderr
  -h, --help             Show this help`;

export interface ScanCommand {
    kind: 'scan';
    request: ScanRequest;
    format: OutputFormat;
    verbose: boolean;
    watch: boolean;
    scanJars: boolean;
    includeTargetClass: boolean;
    concurrency: number;
}

export interface McpCommand {
    kind: 'mcp';
    verbose: boolean;
    scanJars: boolean;
    includeTargetClass: boolean;
    concurrency: number;
}

export type CliCommand = { kind: 'help' } | ScanCommand | McpCommand;

const argsSchema = z.object({
    class: z.string().trim().optional(),
    method: z.string().trim().optional(),
    scan: z.string().trim().min(1, 'Scan folder must not be empty').optional(),
    format: z.enum(OUTPUT_FORMATS, {
        errorMap: () => ({ message: `Format must be one of: ${OUTPUT_FORMATS.join(', ')}` }),
    }).default('txt'),
    jobs: z.coerce.number({ invalid_type_error: 'Jobs must be a number' }).int().positive('Jobs must be a positive integer').optional(),
    jars: z.boolean().default(false),
    'include-self': z.boolean().default(false),
    watch: z.boolean().default(false),
    mcp: z.boolean().default(false),
    verbose: z.boolean().default(false),
    help: z.boolean().default(false),
});

/**
 * Turns argv (without node and script) into a command. Config supplies the
 * defaults that flags do not override.
 */
export function parseCliArgs(argv: string[], config: Pick<Config, 'scanFolder' | 'concurrency' | 'scanJars' | 'verbose'>): CliCommand {
    let values: unknown;
    try {
        values = parseArgs({
            args: argv,
            allowPositionals: false,
            strict: true,
            options: {
                class: { type: 'string', short: 'c' },
                method: { type: 'string', short: 'm' },
                scan: { type: 'string', short: 's' },
                format: { type: 'string', short: 'f' },
                jobs: { type: 'string', short: 'j' },
                jars: { type: 'boolean' },
                'include-self': { type: 'boolean' },
                watch: { type: 'boolean', short: 'w' },
                mcp: { type: 'boolean' },
                verbose: { type: 'boolean', short: 'v' },
                help: { type: 'boolean', short: 'h' },
            },
        }).values;
    } catch (e) {
        throw new InputError(errorMessage(e));
    }

    const parsed = argsSchema.safeParse(values);
    if (!parsed.success) {
        throw new InputError(parsed.error.issues.map(issue => issue.message).join('; '));
    }
    const args = parsed.data;

    if (args.help) {
        return { kind: 'help' };
    }

    const shared = {
        verbose: args.verbose || config.verbose,
        scanJars: args.jars || config.scanJars,
        includeTargetClass: args['include-self'],
        concurrency: args.jobs ?? config.concurrency,
    };

    if (args.mcp) {
        return { kind: 'mcp', ...shared };
    }

    if (!args.class) {
        throw new InputError('Missing required option --class');
    }
    if (!args.method) {
        throw new InputError('Missing required option --method');
    }

    return {
        kind: 'scan',
        request: {
            root: args.scan ?? config.scanFolder,
            className: args.class,
            methodName: args.method,
        },
        format: args.format,
        watch: args.watch,
        ...shared,
    };
}
