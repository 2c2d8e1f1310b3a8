// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

export type LinkOutcome = 'created' | 'kept';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   const abs = path.resolve(dirPath);
   fs.mkdirSync(abs, { recursive: true });
   return abs;
}

/**
 * True if anything occupies `targetPath`, including a dangling symlink.
 */
export function entryExistsSync(targetPath: string): boolean {
   return lstatSafeSync(targetPath) !== null;
}

/**
 * Get file stats (following links) if they exist, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Like statSafeSync, but describes a link itself rather than its target.
 */
export function lstatSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.lstatSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Create a symlink at `linkPath` pointing at `target`, unless an entry
 * already exists there. Existence check and creation are a single
 * `symlink` call: EEXIST means "kept", every other failure is rethrown.
 */
export function linkIfAbsentSync(target: string, linkPath: string): LinkOutcome {
   try {
      fs.symlinkSync(target, linkPath);
      return 'created';
   } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') {
         return 'kept';
      }
      throw err;
   }
}

/**
 * Target for a symlink placed in `linkDir` that should reach `target`.
 *
 * The kernel resolves a relative link target from the link directory's
 * real path, so both directories are resolved first. The target's own
 * name is kept as given, even when it is itself a link. Falls back to an
 * absolute target when no relative path exists (e.g. across drives).
 */
export function symlinkTargetSync(linkDir: string, target: string): string {
   const realDir = fs.realpathSync(linkDir);
   const realTarget = path.join(
      fs.realpathSync(path.dirname(target)),
      path.basename(target),
   );
   const rel = path.relative(realDir, realTarget);
   return path.isAbsolute(rel) ? realTarget : rel;
}

/**
 * Write a UTF-8 file through a sibling temp file and a rename, so readers
 * only ever see the old contents or the complete new ones.
 */
export function writeFileAtomicSync(filePath: string, contents: string): void {
   const abs = path.resolve(filePath);
   const tmp = path.join(
      path.dirname(abs),
      `.${path.basename(abs)}.${process.pid}.tmp`,
   );

   try {
      fs.writeFileSync(tmp, contents, 'utf8');
      fs.renameSync(tmp, abs);
   } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw err;
   }
}

/**
 * Read a file as UTF-8, returning null if it doesn't exist.
 */
export function readFileSafeSync(filePath: string): string | null {
   try {
      return fs.readFileSync(filePath, 'utf8');
   } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
         return null;
      }
      throw err;
   }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
   return err instanceof Error && 'code' in err;
}
