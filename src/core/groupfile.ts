// src/core/groupfile.ts

import type {
    GroupfileDiagnostic,
    GroupfileFlag,
    GroupfileRecord,
} from '../schema';
import {OVERWRITE_FLAG} from '../schema';

export interface RenderGroupfileInput {
    comment: string;
    /**
     * Argument vectors, one per replica, already in index order.
     */
    lines: string[][];
}

export interface ParsedGroupfile {
    records: GroupfileRecord[];
    diagnostics: GroupfileDiagnostic[];
}

const VALUE_FLAGS: readonly GroupfileFlag[] = ['-i', '-p', '-c', '-o', '-r', '-x', '-inf', '-ref'];

function isValueFlag(token: string): token is GroupfileFlag {
    return VALUE_FLAGS.some((flag) => flag === token);
}

function commentLine(comment: string): string {
    const trimmed = comment.trim();
    return trimmed.startsWith('#') ? trimmed : `# ${trimmed}`;
}

/**
 * Render the manifest: one comment line, then one line per replica.
 * Every line, including the last, is newline-terminated.
 */
export function renderGroupfile(input: RenderGroupfileInput): string {
    const out = [commentLine(input.comment), ...input.lines.map((args) => args.join(' '))];
    return out.map((line) => `${line}\n`).join('');
}

/**
 * Parse a single argument line. Returns the record plus any diagnostics
 * raised for it.
 */
function parseLine(text: string, lineNo: number): ParsedGroupfile {
    const args = text.trim().split(/\s+/);
    const files: Partial<Record<GroupfileFlag, string>> = {};
    const diagnostics: GroupfileDiagnostic[] = [];
    let overwrite = false;

    for (let i = 0; i < args.length; i++) {
        const token = args[i];
        if (token === OVERWRITE_FLAG) {
            overwrite = true;
            continue;
        }
        if (!isValueFlag(token)) continue;

        const value = args[i + 1];
        if (value === undefined || value.startsWith('-')) {
            diagnostics.push({
                code: 'missing-value',
                line: lineNo,
                message: `Flag "${token}" on line ${lineNo} has no value.`,
            });
            continue;
        }
        files[token] = value;
        i++;
    }

    if (!files['-i']) {
        diagnostics.push({
            code: 'missing-control',
            line: lineNo,
            message: `Line ${lineNo} has no control file (-i).`,
        });
    }
    if (!files['-p']) {
        diagnostics.push({
            code: 'missing-topology',
            line: lineNo,
            message: `Line ${lineNo} has no topology file (-p).`,
        });
    }
    if (!files['-c']) {
        diagnostics.push({
            code: 'missing-coordinates',
            line: lineNo,
            message: `Line ${lineNo} has no starting coordinates (-c).`,
        });
    }

    return {
        records: [{
            line: lineNo,
            args,
            overwrite,
            controlFile: files['-i'],
            topologyFile: files['-p'],
            coordinates: files['-c'],
            files,
        }],
        diagnostics,
    };
}

/**
 * Read a groupfile back into one record per argument line.
 * Blank lines and lines starting with "#" are skipped.
 */
export function parseGroupfile(text: string): ParsedGroupfile {
    const records: GroupfileRecord[] = [];
    const diagnostics: GroupfileDiagnostic[] = [];

    text.split(/\r?\n/).forEach((raw, idx) => {
        const trimmed = raw.trim();
        if (!trimmed || trimmed.startsWith('#')) return;

        const parsed = parseLine(trimmed, idx + 1);
        records.push(...parsed.records);
        diagnostics.push(...parsed.diagnostics);
    });

    return {records, diagnostics};
}
