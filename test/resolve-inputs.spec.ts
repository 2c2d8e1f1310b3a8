// test/resolve-inputs.spec.ts

import path from 'path';
import {describe, it, expect} from 'vitest';
import {parseReplicaCount, resolveGenerateInput} from '../src/core/resolve-inputs';
import {PreconditionError} from '../src/core/errors';

const cwd = path.resolve('/work/us');

describe('parseReplicaCount', () => {
    it('accepts plain digits', () => {
        expect(parseReplicaCount('6')).toBe(6);
        expect(parseReplicaCount(' 12 ')).toBe(12);
    });

    it('rejects counts above the upper bound with a validate error', () => {
        expect(() => parseReplicaCount('99999999999999999999')).toThrowError(PreconditionError);
        expect(() => parseReplicaCount('100001')).toThrowError(
            'Replica count must not exceed 100000, got "100001".',
        );
        expect(parseReplicaCount('100000')).toBe(100000);
    });

    it.each(['abc', '2.5', '-1', '1e3', ''])('rejects "%s"', (value) => {
        expect(() => parseReplicaCount(value)).toThrowError(PreconditionError);
    });
});

describe('resolveGenerateInput', () => {
    it('derives the three input names from a basename', () => {
        const input = resolveGenerateInput(cwd, {replicas: '6', basename: 'DMP_US'});

        expect(input).toEqual({
            workdir: cwd,
            replicas: 6,
            controlFile: 'DMP_US.inp',
            topologyFile: 'DMP_US.parm7',
            sourceStructure: 'DMP_US_0.rst7',
            coordDir: undefined,
            groupfile: undefined,
            comment: undefined,
        });
    });

    it('prefers explicit names over the basename convention', () => {
        const input = resolveGenerateInput(cwd, {
            replicas: '2',
            basename: 'DMP_US',
            topology: 'solvated.parm7',
        });

        expect(input.controlFile).toBe('DMP_US.inp');
        expect(input.topologyFile).toBe('solvated.parm7');
    });

    it('lets CLI values override the config file', () => {
        const input = resolveGenerateInput(
            cwd,
            {replicas: '4', source: 'eq.rst7'},
            {
                configPath: '/proj/groupfile.config.ts',
                configDir: '/proj',
                config: {
                    replicas: 8,
                    workdir: 'runs/us',
                    basename: 'DMP_US',
                    sourceStructure: 'DMP_US_eq.rst7',
                    coordDir: 'starts',
                    comment: 'from config',
                },
            },
        );

        expect(input.replicas).toBe(4);
        expect(input.sourceStructure).toBe('eq.rst7');
        expect(input.workdir).toBe(path.resolve('/proj', 'runs/us'));
        expect(input.coordDir).toBe('starts');
        expect(input.comment).toBe('from config');
    });

    it('resolves a CLI working directory against cwd', () => {
        const input = resolveGenerateInput(cwd, {replicas: '1', basename: 'x', workdir: '../other'});
        expect(input.workdir).toBe(path.resolve(cwd, '../other'));
    });

    it('names the missing option', () => {
        expect(() => resolveGenerateInput(cwd, {basename: 'DMP_US'})).toThrowError(
            'Missing replica count (--replicas)',
        );
        expect(() =>
            resolveGenerateInput(cwd, {replicas: '2', control: 'a.inp', topology: 'a.parm7'}),
        ).toThrowError('Missing source structure (--source)');
    });
});
