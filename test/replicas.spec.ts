// test/replicas.spec.ts

import {describe, it, expect} from 'vitest';
import {coordExtension, coordName, enumerateReplicas} from '../src/core/replicas';

const shared = {
    controlFile: 'DMP_US.inp',
    topologyFile: 'DMP_US.parm7',
    coordDir: 'inpcrds',
    coordExt: 'rst7',
};

describe('replicas', () => {
    it('derives the extension from the source structure', () => {
        expect(coordExtension('DMP_US_0.rst7')).toBe('rst7');
        expect(coordExtension('/data/eq/final.ncrst')).toBe('ncrst');
        expect(coordExtension('start')).toBe('');
    });

    it('names references r<i>.<ext>', () => {
        expect(coordName(0, 'rst7')).toBe('r0.rst7');
        expect(coordName(17, '')).toBe('r17');
    });

    it('enumerates replicas in ascending order with their arguments', () => {
        const replicas = enumerateReplicas(3, shared);

        expect(replicas.map((r) => r.index)).toEqual([0, 1, 2]);
        expect(replicas[2]).toEqual({
            index: 2,
            coordName: 'r2.rst7',
            coordinates: 'inpcrds/r2.rst7',
            args: ['-O', '-i', 'DMP_US.inp', '-p', 'DMP_US.parm7', '-c', 'inpcrds/r2.rst7'],
        });
    });

    it('normalises the coordinate directory in manifest paths', () => {
        const [first] = enumerateReplicas(1, {...shared, coordDir: './starts/'});
        expect(first.coordinates).toBe('starts/r0.rst7');
    });
});
