// test/watcher.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {
    createRunScheduler,
    watchGroupfile,
    type GroupfileWatcher,
    type WatchRunOutcome,
} from '../src/core/watcher';
import {makeTempDir, removeDir, silentLogger, writeSharedInputs} from './helpers';

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('createRunScheduler', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('runs once after a burst of requests settles', async () => {
        const task = vi.fn(async () => undefined);
        const scheduler = createRunScheduler(task, 50);

        scheduler.schedule();
        scheduler.schedule();
        scheduler.schedule();
        await vi.advanceTimersByTimeAsync(49);
        expect(task).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(1);
        expect(task).toHaveBeenCalledTimes(1);
    });

    it('queues exactly one more run for requests made while running', async () => {
        let release: () => void = () => undefined;
        const task = vi.fn(
            () =>
                new Promise<void>((resolve) => {
                    release = resolve;
                }),
        );
        const scheduler = createRunScheduler(task, 10);

        scheduler.schedule();
        await vi.advanceTimersByTimeAsync(10);
        expect(task).toHaveBeenCalledTimes(1);

        scheduler.schedule();
        await vi.advanceTimersByTimeAsync(10);
        scheduler.schedule();
        await vi.advanceTimersByTimeAsync(10);
        expect(task).toHaveBeenCalledTimes(1);

        release();
        await vi.advanceTimersByTimeAsync(10);
        expect(task).toHaveBeenCalledTimes(2);

        release();
        await vi.advanceTimersByTimeAsync(100);
        expect(task).toHaveBeenCalledTimes(2);
    });

    it('ignores requests after cancel', async () => {
        const task = vi.fn(async () => undefined);
        const scheduler = createRunScheduler(task, 10);

        scheduler.schedule();
        scheduler.cancel();
        scheduler.schedule();
        await vi.advanceTimersByTimeAsync(100);

        expect(task).not.toHaveBeenCalled();
    });
});

describe('watchGroupfile', () => {
    let cwd: string;
    let handle: GroupfileWatcher | undefined;
    let outcomes: WatchRunOutcome[];

    function start(): GroupfileWatcher {
        handle = watchGroupfile(cwd, {
            cli: {replicas: '2', basename: 'DMP_US'},
            debounceMs: 20,
            logger: silentLogger,
            onRun: (outcome) => outcomes.push(outcome),
        });
        return handle;
    }

    beforeEach(() => {
        cwd = makeTempDir();
        outcomes = [];
        handle = undefined;
    });

    afterEach(async () => {
        await handle?.close();
        removeDir(cwd);
    });

    it('generates the groupfile on start', async () => {
        writeSharedInputs(cwd);
        start();

        await vi.waitFor(() => expect(outcomes.length).toBeGreaterThan(0), {timeout: 5000});

        expect(outcomes[0]).toMatchObject({status: 'generated', result: {replicas: 2}});
        expect(fs.readFileSync(path.join(cwd, 'groupfile'), 'utf8').split('\n')[2]).toBe(
            '-O -i DMP_US.inp -p DMP_US.parm7 -c inpcrds/r1.rst7',
        );
    });

    it('regenerates once a missing source structure appears', async () => {
        writeSharedInputs(cwd);
        fs.rmSync(path.join(cwd, 'DMP_US_0.rst7'));
        start();

        await vi.waitFor(() => expect(outcomes.length).toBeGreaterThan(0), {timeout: 5000});
        expect(outcomes[0]).toMatchObject({status: 'failed', error: {step: 'source'}});
        expect(fs.existsSync(path.join(cwd, 'groupfile'))).toBe(false);

        // Let chokidar attach to the parent directory of the missing file.
        await sleep(300);
        fs.writeFileSync(path.join(cwd, 'DMP_US_0.rst7'), 'test coordinates\n', 'utf8');

        await vi.waitFor(() => expect(fs.existsSync(path.join(cwd, 'groupfile'))).toBe(true), {
            timeout: 5000,
        });
        expect(outcomes.at(-1)).toMatchObject({status: 'generated'});
    });

    it('stops regenerating after close', async () => {
        writeSharedInputs(cwd);
        const watcher = start();

        await vi.waitFor(() => expect(outcomes.length).toBeGreaterThan(0), {timeout: 5000});
        await watcher.close();
        const runs = outcomes.length;

        fs.writeFileSync(path.join(cwd, 'DMP_US_0.rst7'), 'other coordinates\n', 'utf8');
        await sleep(200);

        expect(outcomes).toHaveLength(runs);
    });
});
