// src/schema/config.ts

/**
 * Default name of the directory (under the working directory) that holds
 * the per-replica coordinate references.
 */
export const DEFAULT_COORD_DIR = 'inpcrds';

/**
 * Default name of the manifest file the MPI driver reads.
 */
export const DEFAULT_GROUPFILE_NAME = 'groupfile';

/**
 * Upper bound on the replica count.
 */
export const MAX_REPLICAS = 100_000;

export const DEFAULT_GROUPFILE_COMMENT =
    'All replicas share the same control file and topology; only the starting coordinates differ.';

/**
 * Flag telling the driver it may overwrite existing output files.
 */
export const OVERWRITE_FLAG = '-O';

/**
 * File names a config file may use, in lookup order.
 */
export const CONFIG_FILE_NAMES = [
    'groupfile.config.ts',
    'groupfile.config.mts',
    'groupfile.config.mjs',
    'groupfile.config.js',
    'groupfile.config.cjs',
] as const;

/**
 * Suffixes applied to `basename` when individual file names are not given.
 */
export const BASENAME_SUFFIXES = {
    controlFile: '.inp',
    topologyFile: '.parm7',
    sourceStructure: '_0.rst7',
} as const;

/**
 * Shape of the default export of `groupfile.config.ts`.
 *
 * Every key is optional; CLI flags override whatever is set here.
 */
export interface GroupfileConfig {
    /**
     * Working directory, relative to the config file's directory.
     * Default: the config file's directory.
     */
    workdir?: string;

    /**
     * Number of replicas (N). Must be a positive integer.
     */
    replicas?: number;

    /**
     * Shared stem for the inputs. With `basename: 'DMP_US'` the defaults
     * become `DMP_US.inp`, `DMP_US.parm7` and `DMP_US_0.rst7`.
     */
    basename?: string;

    /**
     * Control (mdin) file passed with `-i`.
     */
    controlFile?: string;

    /**
     * Topology (prmtop) file passed with `-p`.
     */
    topologyFile?: string;

    /**
     * Structure every new coordinate reference links to.
     * Relative paths resolve against the working directory.
     */
    sourceStructure?: string;

    /**
     * Directory for `r<i>.<ext>` references. Default: "inpcrds".
     */
    coordDir?: string;

    /**
     * Manifest file name. Default: "groupfile".
     */
    groupfile?: string;

    /**
     * Text of the manifest's leading comment line.
     */
    comment?: string;
}
