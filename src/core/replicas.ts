// src/core/replicas.ts

import path from 'path';
import {OVERWRITE_FLAG} from '../schema';
import type {Replica, SharedInputs} from '../schema';
import {toPosixPath} from '../util/fs-utils';

/**
 * Extension of the source structure without the leading dot
 * ("DMP_US_0.rst7" → "rst7", "start" → "").
 */
export function coordExtension(sourceStructure: string): string {
    return path.extname(sourceStructure).replace(/^\./, '');
}

export function coordName(index: number, ext: string): string {
    return ext ? `r${index}.${ext}` : `r${index}`;
}

export function buildReplicaArgs(coordinates: string, shared: SharedInputs): string[] {
    return [
        OVERWRITE_FLAG,
        '-i', shared.controlFile,
        '-p', shared.topologyFile,
        '-c', coordinates,
    ];
}

export function replicaAt(index: number, shared: SharedInputs): Replica {
    const name = coordName(index, shared.coordExt);
    const coordinates = toPosixPath(path.join(shared.coordDir, name));
    return {
        index,
        coordName: name,
        coordinates,
        args: buildReplicaArgs(coordinates, shared),
    };
}

/**
 * Replicas 0..count-1 in ascending index order.
 */
export function enumerateReplicas(count: number, shared: SharedInputs): Replica[] {
    return Array.from({length: count}, (_, index) => replicaAt(index, shared));
}
