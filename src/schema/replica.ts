// src/schema/replica.ts

import type {LinkOutcome} from '../util/fs-utils';

/**
 * File names shared by every replica.
 */
export interface SharedInputs {
    controlFile: string;
    topologyFile: string;
    coordDir: string;
    /**
     * Extension of the source structure without the dot, or '' if it has none.
     */
    coordExt: string;
}

export interface Replica {
    index: number;
    /**
     * Entry name inside the coordinate directory, e.g. "r3.rst7".
     */
    coordName: string;
    /**
     * Path written to the manifest, e.g. "inpcrds/r3.rst7".
     */
    coordinates: string;
    args: string[];
}

export interface ReplicaOutcome {
    index: number;
    coordinates: string;
    status: LinkOutcome;
}

export type GroupfileFlag = '-i' | '-p' | '-c' | '-o' | '-r' | '-x' | '-inf' | '-ref';

/**
 * One argument line read back from a groupfile.
 */
export interface GroupfileRecord {
    /**
     * 1-based line number in the file.
     */
    line: number;
    args: string[];
    overwrite: boolean;
    controlFile?: string;
    topologyFile?: string;
    coordinates?: string;
    /**
     * Every flag/value pair on the line, including the three above.
     */
    files: Partial<Record<GroupfileFlag, string>>;
}

export type GroupfileDiagnosticCode =
    | 'missing-value'
    | 'missing-control'
    | 'missing-topology'
    | 'missing-coordinates';

export interface GroupfileDiagnostic {
    code: GroupfileDiagnosticCode;
    line: number;
    message: string;
}
