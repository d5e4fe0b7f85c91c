import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import chalk from 'chalk';
import { HASH_FILE_PREFIX } from './constants';

/**
 * SHA-256 over the bytes of `files`, concatenated in sorted path order so
 * the digest does not depend on directory listing order.
 */
export async function computeContentHash(files: string[]): Promise<string> {
  const hashSum = crypto.createHash('sha256');
  for (const file of [...files].sort()) {
    hashSum.update(await fs.readFile(file));
  }
  return hashSum.digest('hex');
}

export interface PruneResult {
  removed: string[];
  failed: string[];
}

/**
 * Last-seen content hashes keyed by (preset, build type). Each record is a
 * file `.conan_hash_<preset>_<buildType>` holding only the hex digest.
 */
export class HashStore {
  constructor(private readonly dir: string) {}

  static fileName(preset: string, buildType: string): string {
    return `${HASH_FILE_PREFIX}${preset}_${buildType}`;
  }

  recordPath(preset: string, buildType: string): string {
    return path.join(this.dir, HashStore.fileName(preset, buildType));
  }

  async read(preset: string, buildType: string): Promise<string | undefined> {
    const recordPath = this.recordPath(preset, buildType);
    if (!await fs.pathExists(recordPath)) {
      return undefined;
    }
    const digest = (await fs.readFile(recordPath, 'utf8')).trim();
    return digest || undefined;
  }

  async write(preset: string, buildType: string, digest: string): Promise<void> {
    await fs.ensureDir(this.dir);
    await fs.writeFile(this.recordPath(preset, buildType), digest);
  }

  async list(): Promise<string[]> {
    if (!await fs.pathExists(this.dir)) {
      return [];
    }
    const names = await fs.readdir(this.dir);
    return names.filter(name => name.startsWith(HASH_FILE_PREFIX)).sort();
  }

  /**
   * The preset a record file belongs to: the longest known preset whose
   * prefix it carries, so `app` never claims the records of `app_asan`.
   */
  static ownerOf(fileName: string, knownPresets: Iterable<string>): string | undefined {
    let owner: string | undefined;
    for (const preset of knownPresets) {
      const prefix = `${HASH_FILE_PREFIX}${preset}_`;
      if (fileName.startsWith(prefix) && fileName.length > prefix.length) {
        if (owner === undefined || preset.length > owner.length) {
          owner = preset;
        }
      }
    }
    return owner;
  }

  /**
   * Names of the records of `preset` whose build type is no longer valid.
   */
  async findOrphans(preset: string, validBuildTypes: Set<string>, knownPresets: Iterable<string> = [preset]): Promise<string[]> {
    const presets = new Set(knownPresets);
    presets.add(preset);
    const prefix = `${HASH_FILE_PREFIX}${preset}_`;

    return (await this.list()).filter(name =>
      HashStore.ownerOf(name, presets) === preset && !validBuildTypes.has(name.slice(prefix.length))
    );
  }

  /**
   * Delete the given records. Failures are reported as warnings and never
   * stop the run.
   */
  async remove(names: string[]): Promise<PruneResult> {
    const result: PruneResult = { removed: [], failed: [] };

    for (const name of names) {
      try {
        await fs.remove(path.join(this.dir, name));
        result.removed.push(name);
        console.log(chalk.gray(`  Cleaned up orphaned hash: ${name}`));
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        result.failed.push(name);
        console.warn(chalk.yellow('Warning:'), `Could not remove ${name}: ${errorMessage}`);
      }
    }

    return result;
  }

  async pruneOrphans(preset: string, validBuildTypes: Set<string>, knownPresets: Iterable<string> = [preset]): Promise<PruneResult> {
    return this.remove(await this.findOrphans(preset, validBuildTypes, knownPresets));
  }

  async clear(): Promise<string[]> {
    const names = await this.list();
    for (const name of names) {
      await fs.remove(path.join(this.dir, name));
    }
    return names;
  }
}
