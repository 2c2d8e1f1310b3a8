// src/core/generate-groupfile.ts

import fs from 'fs';
import path from 'path';
import pluralize from 'pluralize';
import {
    MAX_REPLICAS,
    DEFAULT_COORD_DIR,
    DEFAULT_GROUPFILE_COMMENT,
    DEFAULT_GROUPFILE_NAME,
} from '../schema';
import type {ReplicaOutcome, SharedInputs} from '../schema';
import {
    ensureDirSync,
    entryExistsSync,
    linkIfAbsentSync,
    statSafeSync,
    symlinkTargetSync,
    toPosixPath,
    writeFileAtomicSync,
} from '../util/fs-utils';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {GenerationIoError, PreconditionError} from './errors';
import {renderGroupfile} from './groupfile';
import {coordExtension, enumerateReplicas} from './replicas';

export interface GenerateGroupfileInput {
    /**
     * Directory that receives the coordinate directory and the manifest.
     */
    workdir: string;
    replicas: number;
    controlFile: string;
    topologyFile: string;
    /**
     * Structure every new coordinate reference links to.
     * Relative paths resolve against `workdir`.
     */
    sourceStructure: string;
    coordDir?: string;
    groupfile?: string;
    comment?: string;
}

export interface GenerateGroupfileOptions {
    logger?: Logger;
}

export interface GenerateGroupfileResult {
    groupfilePath: string;
    coordDirPath: string;
    replicas: ReplicaOutcome[];
    created: number;
    kept: number;
    /**
     * Manifest text exactly as written.
     */
    contents: string;
}

function assertToken(value: string, name: string): void {
    if (!value || /\s/.test(value)) {
        throw new PreconditionError(
            `${name} must be a non-empty name without whitespace, got "${value}".`,
            'validate',
        );
    }
}

function assertReplicaCount(replicas: number): void {
    if (!Number.isInteger(replicas) || replicas < 1) {
        throw new PreconditionError(
            `Replica count must be a positive integer, got ${replicas}.`,
            'validate',
        );
    }
    if (replicas > MAX_REPLICAS) {
        throw new PreconditionError(
            `Replica count must not exceed ${MAX_REPLICAS}, got ${replicas}.`,
            'validate',
        );
    }
}

function assertSourceStructure(sourceAbs: string): void {
    const stat = statSafeSync(sourceAbs);
    if (!stat) {
        throw new PreconditionError('Source structure file not found.', 'source', sourceAbs);
    }
    if (!stat.isFile()) {
        throw new PreconditionError('Source structure is not a regular file.', 'source', sourceAbs);
    }
    try {
        fs.accessSync(sourceAbs, fs.constants.R_OK);
    } catch {
        throw new PreconditionError('Source structure file is not readable.', 'source', sourceAbs);
    }
}

/**
 * Populate `<workdir>/<coordDir>` with one link per replica and (re)write
 * the manifest.
 *
 * - All input checks happen before anything touches the disk.
 * - Existing `r<i>.<ext>` entries are never replaced, so hand-edited
 *   starting structures survive re-runs.
 * - The manifest is rewritten in full each time, via temp file + rename.
 */
export function generateGroupfile(
    input: GenerateGroupfileInput,
    options: GenerateGroupfileOptions = {},
): GenerateGroupfileResult {
    const logger = options.logger ?? defaultLogger.child('[generate]');

    const workdir = path.resolve(input.workdir);
    const coordDir = input.coordDir ?? DEFAULT_COORD_DIR;
    const groupfileName = input.groupfile ?? DEFAULT_GROUPFILE_NAME;
    const comment = input.comment ?? DEFAULT_GROUPFILE_COMMENT;

    assertReplicaCount(input.replicas);
    assertToken(input.controlFile, 'Control file');
    assertToken(input.topologyFile, 'Topology file');
    assertToken(coordDir, 'Coordinate directory');
    assertToken(groupfileName, 'Groupfile name');
    if (comment.includes('\n')) {
        throw new PreconditionError('Groupfile comment must be a single line.', 'validate');
    }

    const sourceAbs = path.resolve(workdir, input.sourceStructure);
    assertSourceStructure(sourceAbs);

    for (const shared of [input.controlFile, input.topologyFile]) {
        if (!entryExistsSync(path.resolve(workdir, shared))) {
            logger.warn(`"${shared}" does not exist in ${workdir}; the driver will need it.`);
        }
    }

    const coordDirPath = path.resolve(workdir, coordDir);
    const groupfilePath = path.resolve(workdir, groupfileName);

    const sharedInputs: SharedInputs = {
        controlFile: input.controlFile,
        topologyFile: input.topologyFile,
        coordDir: toPosixPath(path.relative(workdir, coordDirPath)),
        coordExt: coordExtension(sourceAbs),
    };
    const replicas = enumerateReplicas(input.replicas, sharedInputs);

    try {
        ensureDirSync(coordDirPath);
    } catch (err) {
        throw new GenerationIoError('create coordinate directory', 'coord-dir', coordDirPath, err);
    }

    let linkTarget: string;
    try {
        linkTarget = symlinkTargetSync(coordDirPath, sourceAbs);
    } catch (err) {
        throw new GenerationIoError('resolve link target', 'link', sourceAbs, err);
    }
    const outcomes: ReplicaOutcome[] = [];

    for (const replica of replicas) {
        const linkPath = path.join(coordDirPath, replica.coordName);
        let status: ReplicaOutcome['status'];
        try {
            status = linkIfAbsentSync(linkTarget, linkPath);
        } catch (err) {
            throw new GenerationIoError('link coordinate reference', 'link', linkPath, err);
        }
        logger.debug(`${replica.coordinates}: ${status === 'created' ? `linked → ${linkTarget}` : 'kept existing entry'}`);
        outcomes.push({index: replica.index, coordinates: replica.coordinates, status});
    }

    const contents = renderGroupfile({
        comment,
        lines: replicas.map((replica) => replica.args),
    });

    try {
        writeFileAtomicSync(groupfilePath, contents);
    } catch (err) {
        throw new GenerationIoError('write groupfile', 'manifest', groupfilePath, err);
    }

    const created = outcomes.filter((o) => o.status === 'created').length;
    const kept = outcomes.length - created;

    logger.info(
        `Wrote ${groupfilePath} with ${input.replicas} ${pluralize('replica', input.replicas)} ` +
        `(${created} ${pluralize('reference', created)} created, ${kept} kept).`,
    );

    return {
        groupfilePath,
        coordDirPath,
        replicas: outcomes,
        created,
        kept,
        contents,
    };
}
