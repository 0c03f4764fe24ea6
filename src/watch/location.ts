import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { ResolutionError, getErrorCode } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import type { FileIdentity, ResolvedLocation } from './types.js';

/**
 * Turn a user-supplied path into the absolute watch target
 */
export function normalizeTarget(target: unknown, cwd: string = process.cwd()): string {
  if (typeof target !== 'string') {
    throw new ResolutionError(target, 'path must be a string');
  }
  if (target.trim().length === 0) {
    throw new ResolutionError(target, 'path is empty');
  }
  if (target.includes('\0')) {
    throw new ResolutionError(target, 'path contains a NUL byte');
  }
  return path.resolve(cwd, target);
}

function toIdentity(filePath: string, stats: fs.Stats): FileIdentity {
  return {
    path: filePath,
    dev: stats.dev,
    ino: stats.ino,
    size: stats.size,
    mtimeMs: stats.mtimeMs,
    isDirectory: stats.isDirectory()
  };
}

function isMissing(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function logStatFailure(filePath: string, error: unknown): void {
  if (!isMissing(error)) {
    log.debug('stat failed, treating path as absent', { path: filePath, code: getErrorCode(error) ?? null });
  }
}

/**
 * Stat a path. Absence yields null; so does any other stat failure, which
 * callers treat the same way.
 */
export async function statIdentity(filePath: string): Promise<FileIdentity | null> {
  try {
    return toIdentity(filePath, await fsp.stat(filePath));
  } catch (error) {
    logStatFailure(filePath, error);
    return null;
  }
}

export function statIdentitySync(filePath: string): FileIdentity | null {
  try {
    return toIdentity(filePath, fs.statSync(filePath));
  } catch (error) {
    logStatFailure(filePath, error);
    return null;
  }
}

export function sameFile(a: FileIdentity | null, b: FileIdentity | null): boolean {
  if (!a || !b) return false;
  return a.dev === b.dev && a.ino === b.ino;
}

/**
 * Walk upward from the target until an existing directory is found.
 *
 * An existing directory target anchors on itself. Otherwise `expectedChild`
 * is the entry of `anchorDir` that leads to the target, and equals the
 * target once `anchorDir` is its parent.
 */
export async function resolveLocation(target: string): Promise<ResolvedLocation> {
  let dir = target;
  let child = target;

  for (;;) {
    const identity = await statIdentity(dir);
    if (identity?.isDirectory) {
      return { anchorDir: dir, expectedChild: child };
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      // Filesystem root that cannot be stat'ed; watch it anyway
      return { anchorDir: dir, expectedChild: child };
    }

    child = dir;
    dir = parent;
  }
}

/**
 * The anchor followed by each of its ancestors up to the filesystem root
 */
export function watchRoots(anchorDir: string): string[] {
  const roots = [anchorDir];
  let current = anchorDir;

  for (;;) {
    const parent = path.dirname(current);
    if (parent === current) break;
    roots.push(parent);
    current = parent;
  }

  return roots;
}

/**
 * Whether `candidate` is the target itself or one of its ancestors
 */
export function isOnPathTo(target: string, candidate: string): boolean {
  if (candidate === target) return true;
  const relative = path.relative(candidate, target);
  return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Entries worth reporting for a watch generation: the chain of directories
 * leading to the target, plus everything directly inside the anchor.
 */
export function createWatchFilter(target: string, location: ResolvedLocation): (candidate: string) => boolean {
  return (candidate: string): boolean => {
    const resolved = path.resolve(candidate);
    return isOnPathTo(target, resolved) || path.dirname(resolved) === location.anchorDir;
  };
}
