import { Inject, Injectable } from '@nestjs/common';
import { statSync } from 'node:fs';
import { SELECTOR_SETTINGS } from '../app.constants';
import type {
  PathMapping,
  SelectorSettings,
} from '../settings/selector-settings';

function isUnder(path: string, root: string): boolean {
  return Boolean(root) && path.startsWith(`${root}/`);
}

function rebase(path: string, fromRoot: string, toRoot: string): string {
  return `${toRoot}${path.slice(fromRoot.length)}`;
}

function isRegularFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

export function applyPathMap(path: string, pathMap: PathMapping[]): string {
  for (const { containerPrefix, hostPrefix } of pathMap) {
    if (isUnder(path, containerPrefix)) {
      return rebase(path, containerPrefix, hostPrefix);
    }
  }
  return path;
}

export function normalizeToArrayRoot(
  path: string,
  arrayRoot: string,
  userRoot: string,
): string {
  // Already on the array root: rewriting again would nest the root when it
  // sits under the user share.
  if (isUnder(path, arrayRoot)) return path;
  if (isUnder(path, userRoot)) return rebase(path, userRoot, arrayRoot);
  return path;
}

/**
 * Cache-tier location of a host path, or null when no candidate exists on disk.
 * Candidates: the path itself, then the array root and user-share mount swapped for the cache root.
 */
export function deriveCachePath(
  hostPath: string,
  roots: { arrayRoot: string; cacheRoot: string; userRoot: string },
): string | null {
  const { arrayRoot, cacheRoot, userRoot } = roots;
  const candidates: string[] = [];
  if (isUnder(hostPath, cacheRoot)) candidates.push(hostPath);
  if (isUnder(hostPath, arrayRoot)) {
    candidates.push(rebase(hostPath, arrayRoot, cacheRoot));
  }
  if (isUnder(hostPath, userRoot)) {
    candidates.push(rebase(hostPath, userRoot, cacheRoot));
  }
  return (
    candidates.find((c) => isUnder(c, cacheRoot) && isRegularFile(c)) ?? null
  );
}

@Injectable()
export class PathTranslator {
  private readonly pathMap: PathMapping[];
  private readonly arrayRoot: string;
  private readonly cacheRoot: string;
  private readonly userRoot: string;

  constructor(@Inject(SELECTOR_SETTINGS) settings: SelectorSettings) {
    this.pathMap = settings.paths.pathMap;
    this.arrayRoot = settings.paths.arrayRoot;
    this.cacheRoot = settings.paths.cacheRoot;
    this.userRoot = settings.paths.userRoot;
  }

  applyPathMap(path: string): string {
    return applyPathMap(path, this.pathMap);
  }

  normalizeToArrayRoot(path: string, arrayRoot = this.arrayRoot): string {
    return normalizeToArrayRoot(path, arrayRoot, this.userRoot);
  }

  deriveCachePath(
    hostPath: string,
    arrayRoot = this.arrayRoot,
    cacheRoot = this.cacheRoot,
  ): string | null {
    return deriveCachePath(hostPath, {
      arrayRoot,
      cacheRoot,
      userRoot: this.userRoot,
    });
  }

  /** Media-server path -> array-tier host path (promotion output). */
  toArrayPath(serverPath: string): string {
    return this.normalizeToArrayRoot(this.applyPathMap(serverPath));
  }

  /** Media-server path -> existing cache-tier copy (demotion output). */
  toCachePath(serverPath: string): string | null {
    return this.deriveCachePath(this.applyPathMap(serverPath));
  }
}
