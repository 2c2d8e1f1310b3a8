// src/core/watcher.ts

import path from 'path';
import chokidar, {type FSWatcher} from 'chokidar';
import {generateResolved, resolveRun, type RunOptions, type RunResult} from './runner';
import {defaultLogger, type Logger} from '../util/logger';
import {CONFIG_FILE_NAMES} from '../schema';

export type WatchRunOutcome =
    | { status: 'generated'; result: RunResult }
    | { status: 'failed'; error: unknown };

export interface WatchOptions extends RunOptions {
    /**
     * Debounce delay in milliseconds between detected changes
     * and a re-run.
     *
     * Default: 150 ms
     */
    debounceMs?: number;

    /**
     * Optional logger; falls back to defaultLogger.child('[watch]').
     */
    logger?: Logger;

    /**
     * Called after every run, successful or not.
     */
    onRun?: (outcome: WatchRunOutcome) => void;
}

export interface GroupfileWatcher {
    watcher: FSWatcher;
    /**
     * Cancel any scheduled run and stop watching.
     */
    close(): Promise<void>;
}

export interface RunScheduler {
    schedule(): void;
    cancel(): void;
}

/**
 * Debounce calls to `task` and never let two runs overlap: a request that
 * arrives during a run queues exactly one more run after it.
 */
export function createRunScheduler(task: () => Promise<void>, debounceMs: number): RunScheduler {
    let timer: NodeJS.Timeout | undefined;
    let running = false;
    let pending = false;
    let cancelled = false;

    async function run() {
        timer = undefined;
        if (running) {
            pending = true;
            return;
        }
        running = true;
        try {
            await task();
        } finally {
            running = false;
            if (pending && !cancelled) {
                pending = false;
                schedule();
            }
        }
    }

    function schedule() {
        if (cancelled) return;
        if (timer) clearTimeout(timer);
        timer = setTimeout(() => {
            void run();
        }, debounceMs);
    }

    function cancel() {
        cancelled = true;
        pending = false;
        if (timer) clearTimeout(timer);
        timer = undefined;
    }

    return {schedule, cancel};
}

/**
 * Watch the config file and the source structure, regenerating the
 * groupfile whenever either changes.
 *
 * The source structure is watched as soon as inputs resolve, even if it
 * does not exist yet, so creating it later triggers a run.
 */
export function watchGroupfile(cwd: string, options: WatchOptions = {}): GroupfileWatcher {
    const logger = options.logger ?? defaultLogger.child('[watch]');
    const debounceMs = options.debounceMs ?? 150;

    const configTargets = options.configPath
        ? [path.resolve(cwd, options.configPath)]
        : CONFIG_FILE_NAMES.map((name) => path.join(path.resolve(cwd), name));

    const watched = new Set<string>(configTargets);

    const watcher = chokidar.watch(configTargets, {
        ignoreInitial: true,
        persistent: true,
    });

    function watchSource(sourcePath: string) {
        if (watched.has(sourcePath)) return;
        watched.add(sourcePath);
        logger.debug(`Watching source structure ${sourcePath}`);
        watcher.add(sourcePath);
    }

    async function regenerate() {
        let outcome: WatchRunOutcome;
        try {
            logger.info('Change detected → regenerating groupfile...');
            const resolved = await resolveRun(cwd, {...options, logger});
            watchSource(resolved.sourceStructure);
            outcome = {status: 'generated', result: generateResolved(resolved, logger)};
        } catch (err) {
            logger.error('Generation failed:', err);
            outcome = {status: 'failed', error: err};
        }
        options.onRun?.(outcome);
    }

    const scheduler = createRunScheduler(regenerate, debounceMs);

    logger.info(`Watching ${configTargets.length === 1 ? configTargets[0] : `groupfile.config.* in ${cwd}`}`);

    watcher
        .on('all', (event, filePath) => {
            logger.debug(`Event ${event} on ${filePath}`);
            scheduler.schedule();
        })
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    // Initial run
    scheduler.schedule();

    return {
        watcher,
        async close() {
            scheduler.cancel();
            await watcher.close();
        },
    };
}
