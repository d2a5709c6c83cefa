import { randomUUID } from 'node:crypto'
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON(path: string): Promise<unknown>;
  writeText(path: string, content: string): Promise<void>;
  writeJSON(path: string, data: unknown): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Names of files and directories directly inside `dir`; empty when it does not exist. */
  list(dir: string): Promise<string[]>;
  rename(from: string, to: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class NodeFileSystem implements FileSystem {
  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf-8');
  }

  async readJSON(filePath: string): Promise<unknown> {
    return JSON.parse(await this.readText(filePath));
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await writeFile(filePath, content, 'utf-8');
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    await this.writeText(filePath, JSON.stringify(data, null, 2));
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await stat(filePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async list(dir: string): Promise<string[]> {
    try {
      return await readdir(dir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  async rename(from: string, to: string): Promise<void> {
    await rename(from, to);
  }

  async mkdir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }

  async remove(filePath: string): Promise<void> {
    await rm(filePath, { recursive: true, force: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();

  async readText(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  }

  async readJSON(filePath: string): Promise<unknown> {
    return JSON.parse(await this.readText(filePath));
  }

  async writeText(filePath: string, content: string): Promise<void> {
    this.files.set(filePath, content);
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    this.files.set(filePath, JSON.stringify(data, null, 2));
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async list(dir: string): Promise<string[]> {
    const prefix = dir.endsWith(path.sep) ? dir : `${dir}${path.sep}`;
    const names = new Set<string>();
    for (const key of this.files.keys()) {
      if (!key.startsWith(prefix)) continue;
      const [first] = key.slice(prefix.length).split(path.sep);
      if (first) names.add(first);
    }
    return [...names];
  }

  async rename(from: string, to: string): Promise<void> {
    const content = await this.readText(from);
    this.files.delete(from);
    this.files.set(to, content);
  }

  async mkdir(_path: string): Promise<void> {}

  /** Removes a file, or everything under a directory. */
  async remove(filePath: string): Promise<void> {
    const prefix = `${filePath}${path.sep}`;
    for (const key of [...this.files.keys()]) {
      if (key === filePath || key.startsWith(prefix)) this.files.delete(key);
    }
  }

  setFile(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }
}

/**
 * Writes through a uniquely named sibling and renames it over the target, so
 * readers see either the old or the new content.
 */
export async function writeAtomic(fs: FileSystem, filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.${randomUUID()}.tmp`;
  await fs.mkdir(path.dirname(filePath));
  await fs.writeText(tmp, content);
  try {
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.remove(tmp);
    throw error;
  }
}
