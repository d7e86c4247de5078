import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

export interface OutputFile {
  name: string;
  size: number;
  extension: string;
}

export interface OutputFileLister {
  /** Returns null when the directory does not exist */
  list(directory: string): Promise<OutputFile[] | null>;
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Lists the regular files directly inside a job's output directory
 */
export class FsOutputFileLister implements OutputFileLister {
  async list(directory: string): Promise<OutputFile[] | null> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    const files: OutputFile[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const stats = await stat(path.join(directory, entry.name));
      files.push({
        name: entry.name,
        size: stats.size,
        extension: path.extname(entry.name),
      });
    }

    return files.sort((a, b) => a.name.localeCompare(b.name));
  }
}
