// test/helpers.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {Logger} from '../src/util/logger';

export const silentLogger = new Logger({level: 'silent'});

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'groupfile-test-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, {recursive: true, force: true});
}

/**
 * Lay out the shared inputs of a small umbrella-sampling run.
 */
export function writeSharedInputs(dir: string, basename = 'DMP_US'): void {
    fs.writeFileSync(path.join(dir, `${basename}.inp`), 'test control\n', 'utf8');
    fs.writeFileSync(path.join(dir, `${basename}.parm7`), 'test topology\n', 'utf8');
    fs.writeFileSync(path.join(dir, `${basename}_0.rst7`), 'test coordinates\n', 'utf8');
}
