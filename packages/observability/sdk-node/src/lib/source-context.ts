import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';
import type { Logger } from '@faultline/observability-logger';

/**
 * Lines around a frame's line
 */
export interface SourceWindow {
  contextLine: string;
  preContext: string[];
  postContext: string[];
}

export interface SourceContextOptions {
  /** Directory relative frame paths are resolved against */
  rootPath: string;
  /** Glob of files loaded by preload() */
  pattern: string;
  /** Globs skipped by preload() */
  excludePatterns: readonly string[];
  logger?: Logger;
}

// Shared by every resolver; null marks a file that could not be read
const sourceFileCache = new Map<string, string[] | null>();

function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Empty the shared source cache
 */
export function clearSourceCache(): void {
  sourceFileCache.clear();
}

/**
 * Loads and caches source files, and cuts context windows out of them
 */
export class SourceContextResolver {
  constructor(private readonly options: SourceContextOptions) {}

  /**
   * Read every file under the root matching the pattern into the cache.
   * Returns the number of files loaded.
   */
  preload(): number {
    const files = globSync(this.options.pattern, {
      cwd: this.options.rootPath,
      absolute: true,
      nodir: true,
      ignore: [...this.options.excludePatterns],
    });

    let loaded = 0;
    for (const file of files) {
      if (this.readSourceFile(file)) {
        loaded++;
      }
    }

    this.options.logger?.debug('Source files preloaded', {
      rootPath: this.options.rootPath,
      files: loaded,
    });
    return loaded;
  }

  /**
   * Context window around `lineno`, or undefined when the file or line is unknown
   */
  resolve(filepath: string, lineno: number, windowSize: number): SourceWindow | undefined {
    const lines = this.readSourceFile(path.resolve(this.options.rootPath, filepath));
    if (!lines || !Number.isInteger(lineno) || lineno < 1 || lineno > lines.length) {
      return undefined;
    }

    const index = lineno - 1;
    const size = Math.max(0, windowSize);

    return {
      contextLine: lines[index],
      preContext: lines.slice(Math.max(0, index - size), index),
      postContext: lines.slice(index + 1, index + 1 + size),
    };
  }

  private readSourceFile(filename: string): string[] | null {
    const cached = sourceFileCache.get(filename);
    if (cached !== undefined) {
      return cached;
    }

    try {
      const lines = splitLines(fs.readFileSync(filename, 'utf-8'));
      sourceFileCache.set(filename, lines);
      return lines;
    } catch {
      sourceFileCache.set(filename, null);
      return null;
    }
  }
}
