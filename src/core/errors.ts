// src/core/errors.ts

import { isErrnoException } from '../util/fs-utils';

export type GenerateStep =
   | 'validate'
   | 'source'
   | 'coord-dir'
   | 'link'
   | 'manifest'
   | 'groupfile'
   | 'config';

/**
 * Base class for every failure the generator reports. `step` names the
 * stage that failed; `path` is the file or directory involved, if any.
 */
export class GroupfileError extends Error {
   constructor(
      message: string,
      public readonly step: GenerateStep,
      public readonly path?: string,
      options?: { cause?: unknown },
   ) {
      super(message, options);
      this.name = 'GroupfileError';
   }
}

/**
 * A required input is missing or invalid. Raised before anything is
 * written to disk.
 */
export class PreconditionError extends GroupfileError {
   constructor(message: string, step: GenerateStep, path?: string) {
      super(message, step, path);
      this.name = 'PreconditionError';
   }
}

export class GenerationIoError extends GroupfileError {
   public readonly code: string | undefined;

   constructor(action: string, step: GenerateStep, path: string, cause: unknown) {
      const code = isErrnoException(cause) ? cause.code : undefined;
      const reason = cause instanceof Error ? cause.message : String(cause);
      super(
         `Failed to ${action}: ${code ? `${code}: ` : ''}${reason}`,
         step,
         path,
         { cause },
      );
      this.name = 'GenerationIoError';
      this.code = code;
   }
}

export class ConfigError extends GroupfileError {
   constructor(message: string, path?: string) {
      super(message, 'config', path);
      this.name = 'ConfigError';
   }
}
