import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import path from 'path';
import fs from 'fs';

type WatchListener = (event: string, filePath: string) => void;

// Mock chokidar; tests fire watcher events by hand
const { handlers, mockWatcher } = vi.hoisted(() => {
    const handlers = new Map<string, WatchListener>();
    const mockWatcher = {
        on: vi.fn((event: string, listener: WatchListener) => {
            handlers.set(event, listener);
        }),
        close: vi.fn(() => Promise.resolve()),
    };
    return { handlers, mockWatcher };
});

vi.mock('chokidar', () => ({
    default: {
        watch: vi.fn(() => mockWatcher),
    },
}));

import chokidar from 'chokidar';

import { Logger } from '../src/logger.js';
import { MethodCallScanner, type ScanResult } from '../src/scanner.js';
import { ClassFileBuilder, OP, callerClass, invoke } from './helpers/class_builder.js';

const TEST_DIR = path.resolve('test-classes-watch');
const TARGET = { className: 'com.example.TargetClass', methodName: 'targetMethod' };

function fire(event: string, filePath: string) {
    const listener = handlers.get('all');
    if (!listener) throw new Error('watcher has no listener');
    listener(event, filePath);
}

function labelled(target: string): ScanResult {
    return { target, matches: [], warnings: [], filesScanned: 0 };
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

describe('MethodCallScanner startWatch', () => {
    let lines: string[];
    let scanner: MethodCallScanner;

    beforeEach(() => {
        vi.mocked(chokidar.watch).mockClear();
        mockWatcher.on.mockClear();
        mockWatcher.close.mockClear();
        handlers.clear();

        fs.rmSync(TEST_DIR, { recursive: true, force: true });
        fs.mkdirSync(path.join(TEST_DIR, 'com/example'), { recursive: true });
        fs.writeFileSync(path.join(TEST_DIR, 'com/example/CallerClass.class'), callerClass());

        lines = [];
        scanner = new MethodCallScanner({ debounceMs: 10, logger: new Logger(false, line => lines.push(line)) });
    });

    afterAll(() => {
        fs.rmSync(TEST_DIR, { recursive: true, force: true });
    });

    it('should scan once up front and watch the resolved root', async () => {
        const results: ScanResult[] = [];
        const handle = await scanner.startWatch({ root: TEST_DIR, ...TARGET }, result => results.push(result));

        expect(results).toHaveLength(1);
        expect(results[0].matches).toEqual([
            { className: 'com.example.CallerClass', methodName: 'callerMethod', lineNumber: 123 },
        ]);
        expect(chokidar.watch).toHaveBeenCalledTimes(1);
        expect(chokidar.watch).toHaveBeenCalledWith(TEST_DIR, { persistent: true, ignoreInitial: true });
        expect(mockWatcher.on.mock.calls.map(call => call[0])).toEqual(['all']);

        await handle.close();
        expect(mockWatcher.close).toHaveBeenCalledTimes(1);
    });

    it('should rescan once for a burst of class file changes', async () => {
        const results: ScanResult[] = [];
        const handle = await scanner.startWatch({ root: TEST_DIR, ...TARGET }, result => results.push(result));

        const builder = new ClassFileBuilder('com/example/Added');
        const ref = builder.methodRef('com/example/TargetClass', 'targetMethod', '()V');
        builder.addMethod({ name: 'added', descriptor: '()V', code: [...invoke(OP.INVOKEVIRTUAL, ref), OP.RETURN] });
        const addedFile = path.join(TEST_DIR, 'com/example/Added.class');
        fs.writeFileSync(addedFile, builder.build());

        fire('add', addedFile);
        fire('change', addedFile);
        fire('add', path.join(TEST_DIR, 'lib.jar'));

        await vi.waitFor(() => expect(results).toHaveLength(2));
        await sleep(50);
        expect(results).toHaveLength(2);
        expect(results[1].matches).toEqual([
            { className: 'com.example.Added', methodName: 'added', lineNumber: null },
            { className: 'com.example.CallerClass', methodName: 'callerMethod', lineNumber: 123 },
        ]);

        await handle.close();
    });

    it('should ignore changes to other files', async () => {
        const results: ScanResult[] = [];
        const handle = await scanner.startWatch({ root: TEST_DIR, ...TARGET }, result => results.push(result));

        fire('change', path.join(TEST_DIR, 'notes.txt'));
        fire('addDir', path.join(TEST_DIR, 'com/example/sub'));
        await sleep(50);

        expect(results).toHaveLength(1);
        await handle.close();
    });

    it('should not rescan after being closed', async () => {
        const results: ScanResult[] = [];
        const handle = await scanner.startWatch({ root: TEST_DIR, ...TARGET }, result => results.push(result));

        fire('change', path.join(TEST_DIR, 'com/example/CallerClass.class'));
        await handle.close();
        await sleep(50);

        expect(results).toHaveLength(1);
    });

    it('should deliver only the newest rescan when scans finish out of order', async () => {
        const pending: Array<(result: ScanResult) => void> = [];
        vi.spyOn(scanner, 'scan')
            .mockResolvedValueOnce(labelled('initial'))
            .mockImplementation(() => new Promise<ScanResult>(resolve => {
                pending.push(resolve);
            }));
        const results: ScanResult[] = [];
        const handle = await scanner.startWatch({ root: TEST_DIR, ...TARGET }, result => results.push(result));
        const classFile = path.join(TEST_DIR, 'com/example/CallerClass.class');

        fire('change', classFile);
        await vi.waitFor(() => expect(pending).toHaveLength(1));
        fire('change', classFile);
        await vi.waitFor(() => expect(pending).toHaveLength(2));

        pending[1](labelled('second'));
        pending[0](labelled('first'));
        await sleep(20);

        expect(results.map(result => result.target)).toEqual(['initial', 'second']);
        await handle.close();
    });

    it('should not report a scan that finishes after close', async () => {
        const pending: Array<(result: ScanResult) => void> = [];
        vi.spyOn(scanner, 'scan')
            .mockResolvedValueOnce(labelled('initial'))
            .mockImplementation(() => new Promise<ScanResult>(resolve => {
                pending.push(resolve);
            }));
        const results: ScanResult[] = [];
        const handle = await scanner.startWatch({ root: TEST_DIR, ...TARGET }, result => results.push(result));

        fire('change', path.join(TEST_DIR, 'com/example/CallerClass.class'));
        await vi.waitFor(() => expect(pending).toHaveLength(1));
        await handle.close();
        pending[0](labelled('late'));
        await sleep(20);

        expect(results.map(result => result.target)).toEqual(['initial']);
    });

    it('should close the watcher when the first scan fails', async () => {
        vi.spyOn(scanner, 'scan').mockRejectedValueOnce(new Error('disk went away'));

        await expect(scanner.startWatch({ root: TEST_DIR, ...TARGET }, () => {})).rejects.toThrow('disk went away');
        expect(chokidar.watch).toHaveBeenCalledTimes(1);
        expect(mockWatcher.close).toHaveBeenCalledTimes(1);
    });

    it('should log a rescan that fails and keep watching', async () => {
        const results: ScanResult[] = [];
        const handle = await scanner.startWatch({ root: TEST_DIR, ...TARGET }, result => results.push(result));

        fs.rmSync(TEST_DIR, { recursive: true, force: true });
        fire('unlink', path.join(TEST_DIR, 'com/example/CallerClass.class'));

        await vi.waitFor(() => expect(lines).toEqual([`ERROR Rescan failed: Scan folder does not exist: ${TEST_DIR}`]));
        expect(results).toHaveLength(1);
        await handle.close();
    });
});
