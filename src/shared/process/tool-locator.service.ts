import { Injectable } from '@nestjs/common';
import { constants, promises as fs } from 'fs';
import * as path from 'path';

/**
 * Finds external binaries on disk.
 *
 * Nothing is cached: the health endpoint must reflect what is installed at
 * request time, not at start-up.
 */
@Injectable()
export class ToolLocatorService {
  /**
   * Absolute path of an executable `command`, or null when none is found.
   * Commands containing a path separator are checked as given.
   */
  async locate(command: string, searchPath: string = process.env.PATH ?? ''): Promise<string | null> {
    if (command.includes('/')) {
      const resolved = path.resolve(command);
      return (await this.isExecutableFile(resolved)) ? resolved : null;
    }

    const directories = searchPath.split(path.delimiter).filter((dir) => dir.length > 0);
    for (const directory of directories) {
      const candidate = path.join(directory, command);
      if (await this.isExecutableFile(candidate)) {
        return candidate;
      }
    }

    return null;
  }

  /**
   * First available command out of `candidates`, in order.
   */
  async resolveFirst(
    candidates: readonly string[],
    searchPath?: string,
  ): Promise<{ command: string; path: string } | null> {
    for (const command of candidates) {
      const located = await this.locate(command, searchPath);
      if (located) {
        return { command, path: located };
      }
    }
    return null;
  }

  private async isExecutableFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) return false;
      await fs.access(filePath, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
