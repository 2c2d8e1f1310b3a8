// src/core/resolve-inputs.ts

import path from 'path';
import {BASENAME_SUFFIXES, MAX_REPLICAS, type GroupfileConfig} from '../schema';
import {PreconditionError} from './errors';
import type {GenerateGroupfileInput} from './generate-groupfile';
import type {LoadGroupfileConfigResult} from './config-loader';

/**
 * Values as they arrive from the command line (all strings, all optional).
 */
export interface GenerateCliValues {
    replicas?: string;
    workdir?: string;
    basename?: string;
    control?: string;
    topology?: string;
    source?: string;
    coordDir?: string;
    groupfile?: string;
}

/**
 * Parse a replica count given as text. Only plain decimal digits are
 * accepted, so "2.5", "-1", "1e3" and "" are all rejected.
 */
export function parseReplicaCount(value: string): number {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        throw new PreconditionError(
            `Replica count must be a positive integer, got "${value}".`,
            'validate',
        );
    }
    const count = Number.parseInt(trimmed, 10);
    if (count > MAX_REPLICAS) {
        throw new PreconditionError(
            `Replica count must not exceed ${MAX_REPLICAS}, got "${value}".`,
            'validate',
        );
    }
    return count;
}

function fromBasename(
    basename: string | undefined,
    key: keyof typeof BASENAME_SUFFIXES,
): string | undefined {
    return basename ? `${basename}${BASENAME_SUFFIXES[key]}` : undefined;
}

function required<T>(value: T | undefined, option: string): T {
    if (value === undefined) {
        throw new PreconditionError(
            `Missing ${option}; pass it on the command line, set it in groupfile.config.ts, or provide a basename.`,
            'validate',
        );
    }
    return value;
}

/**
 * Merge CLI values, config file values and the basename convention into
 * generator input. CLI wins over config; explicit names win over names
 * derived from `basename`.
 */
export function resolveGenerateInput(
    cwd: string,
    cli: GenerateCliValues,
    loaded?: LoadGroupfileConfigResult,
): GenerateGroupfileInput {
    const config: GroupfileConfig = loaded?.config ?? {};
    const configDir = loaded?.configDir ?? cwd;

    const workdir = cli.workdir !== undefined
        ? path.resolve(cwd, cli.workdir)
        : path.resolve(configDir, config.workdir ?? '.');

    const basename = cli.basename ?? config.basename;

    const replicas = cli.replicas !== undefined
        ? parseReplicaCount(cli.replicas)
        : required(config.replicas, 'replica count (--replicas)');

    return {
        workdir,
        replicas,
        controlFile: required(
            cli.control ?? config.controlFile ?? fromBasename(basename, 'controlFile'),
            'control file (--control)',
        ),
        topologyFile: required(
            cli.topology ?? config.topologyFile ?? fromBasename(basename, 'topologyFile'),
            'topology file (--topology)',
        ),
        sourceStructure: required(
            cli.source ?? config.sourceStructure ?? fromBasename(basename, 'sourceStructure'),
            'source structure (--source)',
        ),
        coordDir: cli.coordDir ?? config.coordDir,
        groupfile: cli.groupfile ?? config.groupfile,
        comment: config.comment,
    };
}
