import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import os from 'os';
import yauzl from 'yauzl';
import chokidar from 'chokidar';
import { ClassParser } from './classfile/class_parser.js';
import { scanClass, type InvocationMatch, type MethodTarget } from './classfile/invocation_scanner.js';
import { toDottedName } from './classfile/resolver.js';
import { InputError, errorMessage } from './errors.js';
import { Logger } from './logger.js';

export interface ScanRequest {
  root: string;
  /** Dotted (`com.example.Foo`) or internal (`com/example/Foo`) form. */
  className: string;
  methodName: string;
}

export interface ScanWarning {
  /** Path of the file, `lib.jar!com/example/Foo.class` for jar entries. */
  file: string;
  message: string;
}

export interface ScanResult {
  /** `<class>#<method>` */
  target: string;
  matches: InvocationMatch[];
  warnings: ScanWarning[];
  filesScanned: number;
}

export interface ScannerOptions {
  /** Files in flight at once. Defaults to the available parallelism. */
  concurrency?: number;
  /** Also look inside .jar files found under the root. */
  scanJars?: boolean;
  includeTargetClass?: boolean;
  logger?: Logger;
  /** Quiet period before a watched change triggers a rescan. */
  debounceMs?: number;
}

export interface WatchHandle {
  close(): Promise<void>;
}

interface FileOutcome {
  matches: InvocationMatch[];
  warnings: ScanWarning[];
  files: number;
}

/**
 * Finds every call site of one method across a tree of compiled classes.
 * Files are parsed independently; the only shared step is the final merge.
 */
export class MethodCallScanner {
  private readonly concurrency: number;
  private readonly scanJars: boolean;
  private readonly includeTargetClass: boolean;
  private readonly logger: Logger;
  private readonly debounceMs: number;

  constructor(options: ScannerOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? os.availableParallelism());
    this.scanJars = options.scanJars ?? false;
    this.includeTargetClass = options.includeTargetClass ?? false;
    this.logger = options.logger ?? new Logger();
    this.debounceMs = options.debounceMs ?? 500;
  }

  public async scan(request: ScanRequest): Promise<ScanResult> {
    const { root, target } = await this.validate(request);
    this.logger.debug(`Start scanning folder: ${root}`);

    const warnings: ScanWarning[] = [];
    const files = await this.discover(root, warnings);
    this.logger.debug(`Found ${files.length} files to analyze.`);

    const outcomes = await runPool(files, this.concurrency, file =>
      file.endsWith('.jar') ? this.scanJar(file, target) : this.scanClassFile(file, target)
    );

    const matches: InvocationMatch[] = [];
    let filesScanned = 0;
    for (const outcome of outcomes) {
      matches.push(...outcome.matches);
      warnings.push(...outcome.warnings);
      filesScanned += outcome.files;
    }

    for (const warning of warnings) {
      this.logger.warn(`${warning.file}: ${warning.message}`);
    }

    return {
      target: `${target.className}#${target.methodName}`,
      matches: matches.sort(compareMatches),
      warnings: warnings.sort((a, b) => compareStrings(a.file, b.file)),
      filesScanned,
    };
  }

  /**
   * Scans once, then rescans whenever a .class or .jar file under the root
   * changes. Changes are debounced.
   */
  public async startWatch(request: ScanRequest, onResult: (result: ScanResult) => void): Promise<WatchHandle> {
    const { root } = await this.validate(request);
    let debounceTimer: NodeJS.Timeout | null = null;
    // Only the most recently started scan may report, and nothing reports after close
    let generation = 0;
    let closed = false;

    const rescan = () => {
      const current = ++generation;
      this.scan(request)
        .then(result => {
          if (closed || current !== generation) {
            this.logger.debug(`Dropping result of superseded scan #${current}`);
            return;
          }
          onResult(result);
        })
        .catch(e => this.logger.error(`Rescan failed: ${errorMessage(e)}`));
    };

    this.logger.debug(`Starting file watcher on ${root}...`);
    const watcher = chokidar.watch(root, {
      persistent: true,
      ignoreInitial: true,
    });

    watcher.on('all', (event: string, filePath: string) => {
      if (!filePath.endsWith('.class') && !filePath.endsWith('.jar')) return;
      this.logger.debug(`${event}: ${filePath}`);
      if (debounceTimer) clearTimeout(debounceTimer);
      debounceTimer = setTimeout(() => {
        debounceTimer = null;
        rescan();
      }, this.debounceMs);
    });

    const initial = generation;
    let result: ScanResult;
    try {
      result = await this.scan(request);
    } catch (e) {
      closed = true;
      if (debounceTimer) clearTimeout(debounceTimer);
      await watcher.close();
      throw e;
    }
    if (initial === generation) {
      onResult(result);
    }

    return {
      close: async () => {
        closed = true;
        if (debounceTimer) clearTimeout(debounceTimer);
        await watcher.close();
      },
    };
  }

  private async validate(request: ScanRequest): Promise<{ root: string; target: MethodTarget }> {
    const className = toDottedName(request.className.trim());
    const methodName = request.methodName.trim();
    if (!className) {
      throw new InputError('Target class must not be empty');
    }
    if (!methodName) {
      throw new InputError('Target method must not be empty');
    }

    const root = path.resolve(request.root);
    let stat: Stats;
    try {
      stat = await fs.stat(root);
    } catch (e) {
      if (isErrnoException(e) && e.code === 'ENOENT') {
        throw new InputError(`Scan folder does not exist: ${root}`);
      }
      throw new InputError(`Cannot access scan folder ${root}: ${errorMessage(e)}`);
    }
    if (!stat.isDirectory()) {
      throw new InputError(`Scan path is not a directory: ${root}`);
    }
    return { root, target: { className, methodName } };
  }

  /**
   * Recursively lists .class files (and .jar files when enabled), in a stable order.
   */
  private async discover(root: string, warnings: ScanWarning[]): Promise<string[]> {
    const results: string[] = [];

    const scanDir = async (dir: string) => {
      let entries;
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (e) {
        warnings.push({ file: dir, message: `Failed to read directory: ${errorMessage(e)}` });
        return;
      }

      for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await scanDir(entryPath);
        } else if (entry.isFile()) {
          if (entry.name.endsWith('.class') || (this.scanJars && entry.name.endsWith('.jar'))) {
            results.push(entryPath);
          }
        }
      }
    };

    await scanDir(root);
    return results.sort(compareStrings);
  }

  private async scanClassFile(file: string, target: MethodTarget): Promise<FileOutcome> {
    this.logger.debug(`Analyzing class file: ${file}`);
    let data: Buffer;
    try {
      data = await fs.readFile(file);
    } catch (e) {
      return { matches: [], warnings: [{ file, message: `Failed to read class file: ${errorMessage(e)}` }], files: 1 };
    }
    return this.scanBytes(file, data, target);
  }

  private async scanJar(file: string, target: MethodTarget): Promise<FileOutcome> {
    this.logger.debug(`Analyzing jar: ${file}`);
    const outcome: FileOutcome = { matches: [], warnings: [], files: 0 };
    try {
      await readJarClasses(file, {
        onClass: (entryName, data) => {
          const entryOutcome = this.scanBytes(`${file}!${entryName}`, data, target);
          outcome.matches.push(...entryOutcome.matches);
          outcome.warnings.push(...entryOutcome.warnings);
          outcome.files += entryOutcome.files;
        },
        onEntryError: (entryName, error) => {
          outcome.warnings.push({ file: `${file}!${entryName}`, message: `Failed to read jar entry: ${error.message}` });
          outcome.files += 1;
        },
      });
    } catch (e) {
      outcome.warnings.push({ file, message: `Failed to read jar: ${errorMessage(e)}` });
    }
    return outcome;
  }

  private scanBytes(label: string, data: Buffer, target: MethodTarget): FileOutcome {
    try {
      const classFile = ClassParser.parse(data);
      const result = scanClass(classFile, target, { includeTargetClass: this.includeTargetClass });
      this.logger.debug(`Visited class: ${result.className} (${result.matches.length} calls)`);
      for (const match of result.matches) {
        this.logger.debug(`Found method call: ${match.className}#${match.methodName} (L${match.lineNumber ?? '?'})`);
      }
      return {
        matches: result.matches,
        warnings: result.warnings.map(w => ({ file: label, message: `${w.method}: ${w.message}` })),
        files: 1,
      };
    } catch (e) {
      return { matches: [], warnings: [{ file: label, message: `Failed to parse class file: ${errorMessage(e)}` }], files: 1 };
    }
  }
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Results
 * keep the order of `items`.
 */
export async function runPool<T, R>(items: readonly T[], concurrency: number, worker: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const lane = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index]);
    }
  };

  const lanes = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () => lane());
  await Promise.all(lanes);
  return results;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Orders by caller class, caller method, then line; unknown lines first.
 */
export function compareMatches(a: InvocationMatch, b: InvocationMatch): number {
  return compareStrings(a.className, b.className)
    || compareStrings(a.methodName, b.methodName)
    || (a.lineNumber ?? -1) - (b.lineNumber ?? -1);
}

interface JarEntryHandlers {
  onClass(entryName: string, data: Buffer): void;
  /** An entry that could not be read; the remaining entries are still visited. */
  onEntryError(entryName: string, error: Error): void;
}

function readJarClasses(jarPath: string, handlers: JarEntryHandlers): Promise<void> {
  return new Promise((resolve, reject) => {
    yauzl.open(jarPath, { lazyEntries: true, autoClose: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`Cannot open ${jarPath}`));
        return;
      }

      const fail = (error: Error) => {
        zipfile.close();
        reject(error);
      };

      zipfile.on('entry', (entry: yauzl.Entry) => {
        if (!entry.fileName.endsWith('.class')) {
          zipfile.readEntry();
          return;
        }
        zipfile.openReadStream(entry, (err, readStream) => {
          if (err || !readStream) {
            handlers.onEntryError(entry.fileName, err ?? new Error(`Cannot read ${entry.fileName}`));
            zipfile.readEntry();
            return;
          }

          // Move on to the next entry exactly once
          let done = false;
          const chunks: Buffer[] = [];
          readStream.on('data', (chunk: Buffer) => chunks.push(Buffer.from(chunk)));
          readStream.on('error', (error: Error) => {
            if (done) return;
            done = true;
            handlers.onEntryError(entry.fileName, error);
            zipfile.readEntry();
          });
          readStream.on('end', () => {
            if (done) return;
            done = true;
            handlers.onClass(entry.fileName, Buffer.concat(chunks));
            zipfile.readEntry();
          });
        });
      });

      zipfile.on('end', () => resolve());
      zipfile.on('error', fail);
      zipfile.readEntry();
    });
  });
}
