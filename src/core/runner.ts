// src/core/runner.ts

import path from 'path';
import {loadGroupfileConfig} from './config-loader';
import {resolveGenerateInput, type GenerateCliValues} from './resolve-inputs';
import {
    generateGroupfile,
    type GenerateGroupfileInput,
    type GenerateGroupfileResult,
} from './generate-groupfile';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';

export interface RunOptions {
    /**
     * Values given on the command line; these override the config file.
     */
    cli?: GenerateCliValues;

    /**
     * Optional explicit config file (absolute or relative to cwd).
     */
    configPath?: string;

    /**
     * Optional logger override.
     */
    logger?: Logger;
}

export interface ResolvedRun {
    input: GenerateGroupfileInput;
    /**
     * Absolute path of the structure the references link to.
     */
    sourceStructure: string;
    configPath?: string;
}

export interface RunResult extends GenerateGroupfileResult {
    sourceStructure: string;
    configPath?: string;
}

/**
 * Load config (if any) and merge it with CLI values, without touching
 * the working directory.
 */
export async function resolveRun(cwd: string, options: RunOptions = {}): Promise<ResolvedRun> {
    const logger = options.logger ?? defaultLogger.child('[runner]');

    const loaded = await loadGroupfileConfig(cwd, {configPath: options.configPath, logger});
    const input = resolveGenerateInput(cwd, options.cli ?? {}, loaded);

    logger.debug(
        `Resolved inputs (workdir=${input.workdir}, replicas=${input.replicas}, config=${loaded?.configPath ?? 'none'})`,
    );

    return {
        input,
        sourceStructure: path.resolve(input.workdir, input.sourceStructure),
        configPath: loaded?.configPath,
    };
}

export function generateResolved(resolved: ResolvedRun, logger?: Logger): RunResult {
    const result = generateGroupfile(resolved.input, {logger});
    return {
        ...result,
        sourceStructure: resolved.sourceStructure,
        configPath: resolved.configPath,
    };
}

/**
 * Load config (if any), merge it with CLI values and generate once.
 */
export async function runOnce(cwd: string, options: RunOptions = {}): Promise<RunResult> {
    const logger = options.logger ?? defaultLogger.child('[runner]');
    const resolved = await resolveRun(cwd, {...options, logger});
    return generateResolved(resolved, logger);
}
