// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';

import { CONFIG_FILE_NAMES, type GroupfileConfig } from '../schema';
import { defaultLogger, type Logger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';
import { ConfigError } from './errors';

export interface LoadGroupfileConfigOptions {
   /**
    * Optional explicit config file path (absolute or relative to cwd).
    * If not provided, we look for groupfile.config.* inside cwd.
    */
   configPath?: string;

   /**
    * Optional logger; resolved from defaultLogger at call time otherwise.
    */
   logger?: Logger;
}

export interface LoadGroupfileConfigResult {
   config: GroupfileConfig;

   /**
    * Absolute path of the config file that was loaded.
    */
   configPath: string;

   /**
    * Directory containing the config file; relative paths in the
    * config resolve against it.
    */
   configDir: string;
}

const STRING_KEYS = [
   'workdir',
   'basename',
   'controlFile',
   'topologyFile',
   'sourceStructure',
   'coordDir',
   'groupfile',
   'comment',
] as const satisfies readonly (keyof GroupfileConfig)[];

/**
 * Load the groupfile config for `cwd`.
 *
 * Returns undefined when no explicit path is given and no
 * groupfile.config.* file exists: a config file is optional.
 */
export async function loadGroupfileConfig(
   cwd: string,
   options: LoadGroupfileConfigOptions = {},
): Promise<LoadGroupfileConfigResult | undefined> {
   const logger = options.logger ?? defaultLogger.child('[config]');
   const absCwd = path.resolve(cwd);

   let configPath: string | undefined;
   if (options.configPath) {
      configPath = path.resolve(absCwd, options.configPath);
      if (!fs.existsSync(configPath)) {
         throw new ConfigError('Config file not found.', configPath);
      }
   } else {
      configPath = findConfigPath(absCwd);
   }

   if (!configPath) {
      logger.debug(`No config file in ${absCwd}; using CLI options only.`);
      return undefined;
   }

   const raw = await importConfig(configPath);
   const config = validateConfig(raw, configPath, logger);

   logger.debug(`Loaded config from ${configPath}`);

   return {
      config,
      configPath,
      configDir: path.dirname(configPath),
   };
}

export function findConfigPath(dir: string): string | undefined {
   for (const file of CONFIG_FILE_NAMES) {
      const full = path.join(dir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check every known key of a config module's export and build a typed
 * GroupfileConfig from it. Unknown keys are ignored with a warning.
 */
export function validateConfig(
   raw: unknown,
   configPath: string,
   logger: Logger = defaultLogger.child('[config]'),
): GroupfileConfig {
   if (!isRecord(raw)) {
      throw new ConfigError('Config must export an object.', configPath);
   }

   const config: GroupfileConfig = {};

   for (const key of STRING_KEYS) {
      const value = raw[key];
      if (value === undefined) continue;
      if (typeof value !== 'string') {
         throw new ConfigError(`"${key}" must be a string.`, configPath);
      }
      config[key] = value;
   }

   const replicas = raw.replicas;
   if (replicas !== undefined) {
      if (typeof replicas !== 'number') {
         throw new ConfigError('"replicas" must be a number.', configPath);
      }
      config.replicas = replicas;
   }

   const known = new Set<string>([...STRING_KEYS, 'replicas']);
   for (const key of Object.keys(raw)) {
      if (!known.has(key)) {
         logger.warn(`Ignoring unknown config key "${key}" in ${configPath}`);
      }
   }

   return config;
}

/**
 * Import a config module from the given path.
 * - For .ts/.mts we transpile with esbuild to ESM and load from a temp file.
 * - For .js/.mjs/.cjs we import directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   if (ext === '.ts' || ext === '.mts') {
      return importTsConfig(configPath);
   }

   return importModuleDefault(pathToFileURL(configPath).href);
}

async function importModuleDefault(url: string): Promise<unknown> {
   const mod: unknown = await import(url);
   if (isRecord(mod) && mod.default !== undefined) {
      return mod.default;
   }
   return mod;
}

/**
 * Transpile a TS config file to ESM with esbuild and import the compiled file.
 * We cache based on (path + mtime) so changes invalidate the temp.
 */
async function importTsConfig(configPath: string): Promise<unknown> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'replica-groupfile-config');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'esm',
         sourcemap: 'inline',
         target: 'es2022',
      });

      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   return importModuleDefault(pathToFileURL(tmpFile).href);
}
