import fs from 'fs-extra';
import path from 'path';
import { randomBytes } from 'crypto';
import { glob } from 'glob';

export class FileSystem {
  /**
   * Create directory if it doesn't exist
   */
  static async ensureDirectory(dir: string): Promise<void> {
    await fs.ensureDir(dir);
  }

  /**
   * Total size in bytes of all regular files below dir
   */
  static async directorySize(dir: string): Promise<number> {
    const files = await glob('**/*', { cwd: dir, nodir: true, dot: true, stat: true, withFileTypes: true });
    return files.reduce((total, file) => total + (file.size ?? 0), 0);
  }

  /**
   * Read JSON file with error handling
   */
  static async readJson(filePath: string): Promise<unknown> {
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new Error(`Failed to read JSON file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Write JSON through a sibling temp file and a rename, so readers never see a torn file
   */
  static async writeJson(filePath: string, data: unknown): Promise<void> {
    const tempPath = `${filePath}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.remove(tempPath);
      throw new Error(`Failed to write JSON file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Unique sibling name for a directory that is about to be created or moved
   */
  static siblingName(dir: string, prefix: string, name: string): string {
    return path.join(dir, `${prefix}${name}-${randomBytes(4).toString('hex')}`);
  }
}
