/**
 * Game Saver
 *
 * Writes finished games to `game_AAA_BBB_CCC.txt`, taking the first
 * name in ascending order that is not already present.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { GameSaveError } from '../errors.js';

export const DEFAULT_GAMES_DIRECTORY = 'games';

const BLOCK_SIZE = 1000;
const MAX_INDEX = BLOCK_SIZE ** 3 - 1;

export interface GameSaverOptions {
  /** Output directory, created on first save (default: 'games') */
  directory?: string;
}

/**
 * File name for the `index`th game: 1005 -> game_000_001_005.txt
 */
export function formatGameFileName(index: number): string {
  const first = Math.floor(index / BLOCK_SIZE ** 2);
  const second = Math.floor(index / BLOCK_SIZE) % BLOCK_SIZE;
  const third = index % BLOCK_SIZE;
  const block = (value: number): string => String(value).padStart(3, '0');
  return `game_${block(first)}_${block(second)}_${block(third)}.txt`;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class GameSaver {
  readonly directory: string;

  constructor(options: GameSaverOptions = {}) {
    this.directory = options.directory ?? DEFAULT_GAMES_DIRECTORY;
  }

  /**
   * Write `notation` to the next free file and return its path
   *
   * @throws GameSaveError if the directory cannot be created or written
   */
  async save(notation: string): Promise<string> {
    await this.ensureDirectory();
    const content = notation.length > 0 ? `${notation}\n` : '';

    for (let index = await this.firstFreeIndex(); index <= MAX_INDEX; index++) {
      const filePath = path.join(this.directory, formatGameFileName(index));
      try {
        // 'wx' fails instead of overwriting a file written since the scan
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
        return filePath;
      } catch (err) {
        if (hasCode(err, 'EEXIST')) continue;
        throw new GameSaveError(this.directory, asError(err));
      }
    }

    throw new GameSaveError(this.directory, new Error('no free file name left'));
  }

  /**
   * Path the next save would use
   */
  async nextFilePath(): Promise<string> {
    return path.join(this.directory, formatGameFileName(await this.firstFreeIndex()));
  }

  private async ensureDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
    } catch (err) {
      throw new GameSaveError(this.directory, asError(err));
    }
  }

  private async firstFreeIndex(): Promise<number> {
    let existing: Set<string>;
    try {
      existing = new Set(await fs.readdir(this.directory));
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return 0;
      throw new GameSaveError(this.directory, asError(err));
    }

    let index = 0;
    while (index < MAX_INDEX && existing.has(formatGameFileName(index))) {
      index++;
    }
    return index;
  }
}
