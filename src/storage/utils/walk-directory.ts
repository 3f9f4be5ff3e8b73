import { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join } from 'path';

export interface WalkDirectoryOptions {
  /**
   * Called when a directory cannot be read; the directory is then skipped.
   * Without it the error propagates.
   */
  onError?: (error: unknown, directory: string) => void;
}

/**
 * Walk a directory tree top-down and yield the path of every file below it.
 * Files of a directory come before the contents of its sub-directories, both
 * sorted by name. Symbolic links to directories are not followed.
 */
export async function* walkDirectory(
  root: string,
  options: WalkDirectoryOptions = {},
): AsyncGenerator<string> {
  let entries: Dirent[];

  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (error) {
    if (!options.onError) {
      throw error;
    }

    options.onError(error, root);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const directories: string[] = [];

  for (const entry of entries) {
    const entryPath = join(root, entry.name);

    if (entry.isDirectory()) {
      directories.push(entryPath);
    } else if (entry.isFile() || (await isLinkToFile(entry, entryPath))) {
      yield entryPath;
    }
  }

  for (const directory of directories) {
    yield* walkDirectory(directory, options);
  }
}

async function isLinkToFile(entry: Dirent, entryPath: string): Promise<boolean> {
  if (!entry.isSymbolicLink()) {
    return false;
  }

  try {
    return (await stat(entryPath)).isFile();
  } catch {
    // dangling link
    return false;
  }
}
