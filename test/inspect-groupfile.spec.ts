// test/inspect-groupfile.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {generateGroupfile} from '../src/core/generate-groupfile';
import {inspectGroupfile} from '../src/core/inspect-groupfile';
import {PreconditionError} from '../src/core/errors';
import {makeTempDir, removeDir, silentLogger, writeSharedInputs} from './helpers';

describe('inspectGroupfile', () => {
    let workdir: string;

    beforeEach(() => {
        workdir = makeTempDir();
        writeSharedInputs(workdir);
        generateGroupfile(
            {
                workdir,
                replicas: 3,
                controlFile: 'DMP_US.inp',
                topologyFile: 'DMP_US.parm7',
                sourceStructure: 'DMP_US_0.rst7',
            },
            {logger: silentLogger},
        );
    });

    afterEach(() => {
        removeDir(workdir);
    });

    it('finds every replica of a freshly generated groupfile', () => {
        const result = inspectGroupfile(path.join(workdir, 'groupfile'), {logger: silentLogger});

        expect(result.records.map((r) => r.coordinates)).toEqual([
            'inpcrds/r0.rst7',
            'inpcrds/r1.rst7',
            'inpcrds/r2.rst7',
        ]);
        expect(result.diagnostics).toEqual([]);
        expect(result.missing).toEqual([]);
    });

    it('reports files that no longer exist', () => {
        fs.unlinkSync(path.join(workdir, 'inpcrds', 'r1.rst7'));
        fs.unlinkSync(path.join(workdir, 'DMP_US.parm7'));

        const {missing} = inspectGroupfile(path.join(workdir, 'groupfile'), {logger: silentLogger});

        expect(missing).toEqual([
            {line: 2, flag: '-p', path: 'DMP_US.parm7'},
            {line: 3, flag: '-p', path: 'DMP_US.parm7'},
            {line: 3, flag: '-c', path: 'inpcrds/r1.rst7'},
            {line: 4, flag: '-p', path: 'DMP_US.parm7'},
        ]);
    });

    it('counts a reference whose target is gone as missing', () => {
        fs.unlinkSync(path.join(workdir, 'DMP_US_0.rst7'));

        const {missing} = inspectGroupfile(path.join(workdir, 'groupfile'), {logger: silentLogger});

        expect(missing.map((m) => m.path)).toEqual([
            'inpcrds/r0.rst7',
            'inpcrds/r1.rst7',
            'inpcrds/r2.rst7',
        ]);
    });

    it('fails with a precondition error when the groupfile is absent', () => {
        expect(() =>
            inspectGroupfile(path.join(workdir, 'nope'), {logger: silentLogger}),
        ).toThrowError(PreconditionError);
        expect(() =>
            inspectGroupfile(path.join(workdir, 'inpcrds'), {logger: silentLogger}),
        ).toThrowError('Groupfile not found.');
    });
});
