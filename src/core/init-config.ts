// src/core/init-config.ts

import fs from 'fs';
import path from 'path';
import {defaultLogger, type Logger} from '../util/logger';
import {CONFIG_FILE_NAMES} from '../schema';

export interface InitConfigOptions {
    /**
     * Overwrite an existing config file.
     */
    force?: boolean;

    /**
     * Name of the config file to write.
     * Default: "groupfile.config.ts"
     */
    fileName?: string;

    /**
     * Optional logger; resolved from defaultLogger at call time otherwise.
     */
    logger?: Logger;
}

export interface InitConfigResult {
    configPath: string;
    created: boolean;
}

// ---------------------------------------------------------------------------
// Default config template
// ---------------------------------------------------------------------------

const DEFAULT_CONFIG_TS = `import type { GroupfileConfig } from 'replica-groupfile';

const config: GroupfileConfig = {
  // Number of replicas (one groupfile line and one r<i> reference each).
  replicas: 6,

  // Shared stem for the inputs. Unless set explicitly below, this implies:
  //   controlFile:     <basename>.inp
  //   topologyFile:    <basename>.parm7
  //   sourceStructure: <basename>_0.rst7
  // basename: 'DMP_US',

  // controlFile: 'DMP_US.inp',
  // topologyFile: 'DMP_US.parm7',
  // sourceStructure: 'DMP_US_0.rst7',

  // Working directory, relative to this file (default: '.').
  // workdir: '.',

  // Directory for per-replica coordinate references (default: 'inpcrds').
  // coordDir: 'inpcrds',

  // Manifest file name (default: 'groupfile').
  // groupfile: 'groupfile',
};

export default config;
`;

/**
 * Write a default groupfile.config.ts into `cwd`.
 *
 * An existing file is left alone unless `force` is set.
 */
export function initConfig(cwd: string, options: InitConfigOptions = {}): InitConfigResult {
    const logger = options.logger ?? defaultLogger.child('[init]');
    const fileName = options.fileName ?? CONFIG_FILE_NAMES[0];
    const configPath = path.resolve(cwd, fileName);

    const existed = fs.existsSync(configPath);
    if (existed && !options.force) {
        logger.info(`Config already exists at ${configPath} (use --force to overwrite).`);
        return {configPath, created: false};
    }

    fs.writeFileSync(configPath, DEFAULT_CONFIG_TS, 'utf8');
    logger.info(`${existed ? 'Overwrote' : 'Created'} config at ${configPath}`);

    return {configPath, created: true};
}
