import { mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { SiteDescriptor } from './sites/descriptor.js';

/**
 * Raised when a path derived from user input (a site's log path, a pid file
 * named after a site) would land outside the directory it belongs to.
 */
export class PathResolutionError extends Error {
  public readonly code = 'E-PATHS-ESCAPE';
  public readonly hint = 'keep paths within the configured base directory';
  public readonly attemptedPath: string;
  public readonly rootDirectory: string;

  constructor(message: string, attemptedPath: string, rootDirectory: string) {
    super(message);
    this.name = 'PathResolutionError';
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes `rootDir`.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathResolutionError('path escapes base directory', targetPath, absoluteRoot);
  }

  return targetPath;
}

/** Absolute path of the log file a site appends to (`log` is relative to `cwd`). */
export function siteLogPath(site: Pick<SiteDescriptor, 'cwd' | 'log'>): string {
  return path.resolve(site.cwd, site.log);
}

/** Location of the pid file persisted for a background-mode site. */
export function pidFilePath(pidDir: string, siteName: string): string {
  return resolveWithin(pidDir, `${siteName}.pid`);
}

/** Whether `target` exists and is a directory. */
export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/** Creates the directory holding a site's log so `tee -a` and `open(..., "a")` can create the file. */
export async function ensureSiteLogDirectory(site: Pick<SiteDescriptor, 'cwd' | 'log'>): Promise<string> {
  const logPath = siteLogPath(site);
  await mkdir(path.dirname(logPath), { recursive: true });
  return logPath;
}
