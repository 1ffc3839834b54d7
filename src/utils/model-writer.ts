/**
 * Model Writers
 *
 * Where generated files go. The filesystem writer is used by the CLI; the
 * in-memory writer backs dry runs and tests.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export interface ModelWriter {
  /** Create a directory and its parents. An existing directory is not an error. */
  ensureDirectory(directory: string): Promise<void>;
  /** Create or overwrite a file */
  writeFile(filePath: string, content: string): Promise<void>;
}

export class FileSystemModelWriter implements ModelWriter {
  async ensureDirectory(directory: string): Promise<void> {
    await fs.mkdir(directory, { recursive: true });
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, 'utf-8');
  }
}

export class InMemoryModelWriter implements ModelWriter {
  readonly directories = new Set<string>();
  readonly files = new Map<string, string>();

  async ensureDirectory(directory: string): Promise<void> {
    this.directories.add(path.normalize(directory));
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.files.set(path.normalize(filePath), content);
  }
}
