// src/core/inspect-groupfile.ts

import path from 'path';
import pluralize from 'pluralize';
import type {GroupfileDiagnostic, GroupfileFlag, GroupfileRecord} from '../schema';
import {readFileSafeSync, statSafeSync} from '../util/fs-utils';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {GenerationIoError, PreconditionError} from './errors';
import {parseGroupfile} from './groupfile';

export interface MissingReference {
    line: number;
    flag: GroupfileFlag;
    path: string;
}

export interface InspectGroupfileResult {
    groupfilePath: string;
    records: GroupfileRecord[];
    diagnostics: GroupfileDiagnostic[];
    missing: MissingReference[];
}

export interface InspectGroupfileOptions {
    logger?: Logger;
}

const CHECKED_FLAGS: readonly GroupfileFlag[] = ['-i', '-p', '-c'];

/**
 * Read a groupfile and check that every control, topology and coordinate
 * file it names exists relative to the groupfile's directory.
 */
export function inspectGroupfile(
    groupfilePath: string,
    options: InspectGroupfileOptions = {},
): InspectGroupfileResult {
    const logger = options.logger ?? defaultLogger.child('[inspect]');
    const abs = path.resolve(groupfilePath);

    let text: string | null;
    try {
        text = statSafeSync(abs)?.isDirectory() ? null : readFileSafeSync(abs);
    } catch (err) {
        throw new GenerationIoError('read groupfile', 'groupfile', abs, err);
    }
    if (text === null) {
        throw new PreconditionError('Groupfile not found.', 'groupfile', abs);
    }

    const {records, diagnostics} = parseGroupfile(text);
    const baseDir = path.dirname(abs);
    const missing: MissingReference[] = [];

    for (const record of records) {
        for (const flag of CHECKED_FLAGS) {
            const ref = record.files[flag];
            if (ref === undefined) continue;
            // A dangling link counts as missing.
            if (statSafeSync(path.resolve(baseDir, ref)) === null) {
                missing.push({line: record.line, flag, path: ref});
            }
        }
    }

    logger.debug(
        `${abs}: ${records.length} ${pluralize('replica', records.length)}, ` +
        `${diagnostics.length} ${pluralize('diagnostic', diagnostics.length)}, ` +
        `${missing.length} missing ${pluralize('file', missing.length)}`,
    );

    return {groupfilePath: abs, records, diagnostics, missing};
}
