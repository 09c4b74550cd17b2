import { existsSync, readFileSync } from 'fs';
import type { INameDirectory } from '../../domain/ports/INameDirectory.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

/**
 * Shape of the directory file: `{ "names": { "Kevin": "@kevin" } }`
 */
export interface DirectoryFile {
  names: Record<string, string>;
}

function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

function parseDirectory(content: string, path: string): DirectoryFile {
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== 'object' || parsed === null || !('names' in parsed)) {
    throw new Error(`Directory file ${path} must contain a "names" object`);
  }

  const { names } = parsed;
  if (typeof names !== 'object' || names === null || Array.isArray(names)) {
    throw new Error(`Directory file ${path} must contain a "names" object`);
  }

  const entries: Record<string, string> = {};
  for (const [name, handle] of Object.entries(names)) {
    if (typeof handle !== 'string' || !handle.trim()) {
      throw new Error(`Directory entry "${name}" in ${path} must map to a non-empty handle`);
    }
    entries[name] = handle.trim();
  }
  return { names: entries };
}

/**
 * Fixed, read-only name directory.
 * Lookups ignore case and repeated whitespace.
 */
export class StaticNameDirectory implements INameDirectory {
  private readonly handles = new Map<string, string>();

  constructor(names: Record<string, string>) {
    for (const [name, handle] of Object.entries(names)) {
      this.handles.set(normalizeName(name), handle);
    }
  }

  /**
   * Load the directory from a JSON file. A missing file yields an empty
   * directory, so every recipient is addressed by spoken name.
   */
  static fromFile(path: string, logger: ILogger): StaticNameDirectory {
    if (!existsSync(path)) {
      logger.warn('Directory file not found, starting with an empty directory', { path });
      return new StaticNameDirectory({});
    }

    const directory = new StaticNameDirectory(parseDirectory(readFileSync(path, 'utf-8'), path).names);
    logger.info('Directory loaded', { path, count: directory.size() });
    return directory;
  }

  lookup(name: string): string | undefined {
    return this.handles.get(normalizeName(name));
  }

  size(): number {
    return this.handles.size;
  }
}
