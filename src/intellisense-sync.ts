import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import {
  BuildDirectory,
  CMakeCacheInfo,
  CompilerInfo,
  ConfigurationEntry,
  PairStatus,
  Settings,
  SynthesizedEntry,
  SyncOutcome
} from './types';
import {
  DEFAULT_SETTINGS,
  GENERATORS_DIR_NAME,
  PROPERTIES_FILE,
  SETTINGS_FILE,
  STATE_FILE,
  VSCODE_DIR,
  settingsSchema
} from './constants';
import { buildTypesOf, readCMakeCache } from './cmake-cache';
import { findDataFiles, scanGeneratorsDirectory } from './conan-data';
import { DetectOptions, detectCompiler } from './compiler-detector';
import { resolveBuildDirectories } from './discovery';
import { HashStore, computeContentHash } from './hash-store';
import { checkCMakeTools } from './cmake-tools-check';
import { createConfigurationEntry, createDocument } from './configuration';

export interface SyncOptions extends DetectOptions {
  workspaceRoot?: string;
}

export interface UpdateOptions {
  buildDir?: string;
  requireCMakeTools?: boolean;
}

interface DirectoryResult {
  entries: ConfigurationEntry[];
  /** Pairs whose new digest is saved once the document is written. */
  pending: SynthesizedEntry[];
  orphans: string[];
}

export class IntelliSenseSync {
  readonly workspaceRoot: string;
  readonly vscodeDir: string;
  readonly hashes: HashStore;
  private settings: Settings | null = null;
  private compiler: CompilerInfo | null = null;
  private readonly platform: NodeJS.Platform;

  constructor(private readonly options: SyncOptions = {}) {
    this.workspaceRoot = path.resolve(options.workspaceRoot ?? process.cwd());
    this.vscodeDir = path.join(this.workspaceRoot, VSCODE_DIR);
    this.hashes = new HashStore(this.vscodeDir);
    this.platform = options.platform ?? process.platform;
  }

  get documentPath(): string {
    return path.join(this.vscodeDir, PROPERTIES_FILE);
  }

  async init(): Promise<void> {
    await this.loadSettings();
    await fs.ensureDir(this.vscodeDir);
  }

  async loadSettings(): Promise<Settings> {
    const settingsPath = path.join(this.workspaceRoot, SETTINGS_FILE);
    let raw: unknown = {};

    if (await fs.pathExists(settingsPath)) {
      try {
        raw = await fs.readJson(settingsPath);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        throw new Error(`Failed to load settings: ${errorMessage}`);
      }
    }

    const { error, value } = settingsSchema.validate(raw);
    if (error) {
      throw new Error(`Settings validation failed: ${error.message}`);
    }

    this.settings = value;
    return value;
  }

  private getSettings(): Settings {
    return this.settings ?? DEFAULT_SETTINGS;
  }

  private async getCompiler(): Promise<CompilerInfo> {
    if (!this.compiler) {
      this.compiler = await detectCompiler(this.options);
    }
    return this.compiler;
  }

  /**
   * Produce the configuration for one (build directory, build type) pair.
   * Returns null when the directory has no Conan generators output yet.
   * Nothing is written here; see `commit`.
   */
  async synthesize(dir: BuildDirectory, buildType: string, cache: CMakeCacheInfo): Promise<SynthesizedEntry | null> {
    const generatorsDir = path.join(dir.path, GENERATORS_DIR_NAME);
    if (!await fs.pathExists(generatorsDir)) {
      return null;
    }

    const dataFiles = await findDataFiles(generatorsDir, buildType);
    const digest = await computeContentHash(dataFiles);
    const stored = await this.hashes.read(dir.preset, buildType);
    const changed = stored !== digest;

    const metadata = await scanGeneratorsDirectory(generatorsDir, buildType);
    const entry = createConfigurationEntry({
      preset: dir.preset,
      buildType,
      metadata,
      cache,
      compiler: await this.getCompiler(),
      settings: this.getSettings(),
      platform: this.platform
    });

    return { entry, preset: dir.preset, buildType, digest, changed };
  }

  async processBuildDirectory(dir: BuildDirectory, knownPresets: Iterable<string> = [dir.preset]): Promise<DirectoryResult> {
    const result: DirectoryResult = { entries: [], pending: [], orphans: [] };
    if (!await fs.pathExists(dir.cacheFile)) {
      return result;
    }

    const cache = await readCMakeCache(dir.cacheFile);
    const buildTypes = buildTypesOf(cache);

    for (const buildType of buildTypes) {
      const synthesized = await this.synthesize(dir, buildType, cache);
      if (synthesized) {
        result.entries.push(synthesized.entry);
        if (synthesized.changed) {
          result.pending.push(synthesized);
        }
      }
    }

    // A dropped build type leaves a stale entry in the document.
    result.orphans = await this.hashes.findOrphans(dir.preset, new Set(buildTypes), knownPresets);
    return result;
  }

  /**
   * Save the digests of regenerated pairs and drop orphaned records. Runs
   * only after the document was written, so a failed write is retried by
   * the next update.
   */
  private async commit(pending: SynthesizedEntry[], orphans: string[]): Promise<void> {
    for (const synthesized of pending) {
      await this.hashes.write(synthesized.preset, synthesized.buildType, synthesized.digest);
      console.log(chalk.gray(`  Regenerated: ${synthesized.entry.name}`));
    }
    await this.hashes.remove(orphans);
  }

  async writeDocument(entries: ConfigurationEntry[]): Promise<void> {
    await fs.ensureDir(this.vscodeDir);
    await fs.writeJson(this.documentPath, createDocument(entries), { spaces: 4 });
  }

  /**
   * Synthesize every build directory and write the document if, and only if,
   * at least one pair changed.
   */
  async generate(buildDirs: BuildDirectory[]): Promise<SyncOutcome> {
    const knownPresets = buildDirs.map(dir => dir.preset);
    const entries: ConfigurationEntry[] = [];
    const pending: SynthesizedEntry[] = [];
    const orphans: string[] = [];

    for (const dir of buildDirs) {
      const result = await this.processBuildDirectory(dir, knownPresets);
      entries.push(...result.entries);
      pending.push(...result.pending);
      orphans.push(...result.orphans);
    }

    if (entries.length === 0) {
      return { kind: 'no-entries' };
    }

    if (pending.length === 0 && orphans.length === 0) {
      return { kind: 'unchanged', entries };
    }

    await this.writeDocument(entries);
    await this.commit(pending, orphans);
    console.log(chalk.green('✓'), `Updated ${this.documentPath} with ${entries.length} configuration(s)`);
    return { kind: 'updated', entries, documentPath: this.documentPath };
  }

  async update(options: UpdateOptions = {}): Promise<SyncOutcome> {
    const strict = options.requireCMakeTools ?? this.getSettings().requireCMakeTools;
    if (!await checkCMakeTools(this.vscodeDir, strict)) {
      throw new Error('CMake Tools extension is required but was not detected');
    }

    const buildDirs = await resolveBuildDirectories(this.workspaceRoot, options.buildDir);
    if (buildDirs.length === 0) {
      throw new Error('No build directories found. Run CMake configure first.');
    }

    return this.generate(buildDirs);
  }

  /**
   * Report, per preset and build type, whether the stored hash still matches
   * the Conan data on disk. Nothing is written.
   */
  async status(buildDir?: string): Promise<PairStatus[]> {
    const buildDirs = await resolveBuildDirectories(this.workspaceRoot, buildDir);
    const compiler = await this.getCompiler();
    const pairs: PairStatus[] = [];

    for (const dir of buildDirs) {
      const cache = await readCMakeCache(dir.cacheFile);
      const generatorsDir = path.join(dir.path, GENERATORS_DIR_NAME);
      const configured = await fs.pathExists(generatorsDir);

      for (const buildType of buildTypesOf(cache)) {
        let upToDate = false;
        if (configured) {
          const digest = await computeContentHash(await findDataFiles(generatorsDir, buildType));
          upToDate = (await this.hashes.read(dir.preset, buildType)) === digest;
        }
        pairs.push({
          preset: dir.preset,
          buildType,
          configured,
          upToDate,
          compiler: cache.compilerPath ? { ...compiler, path: cache.compilerPath } : compiler
        });
      }
    }

    return pairs;
  }

  async checkStatus(buildDir?: string): Promise<void> {
    const pairs = await this.status(buildDir);

    console.log(chalk.bold('\nIntelliSense Sync Status\n'));
    console.log(chalk.cyan('Workspace:'), this.workspaceRoot);
    console.log(chalk.cyan('Properties file:'), this.documentPath);

    if (pairs.length === 0) {
      console.log(chalk.yellow('\nNo build directories found. Run CMake configure first.\n'));
      return;
    }

    console.log(chalk.bold('\nConfigurations:\n'));
    for (const pair of pairs) {
      const name = `${pair.preset}-${pair.buildType}`;
      let marker: string;
      if (!pair.configured) {
        marker = chalk.yellow(' [NOT CONFIGURED]');
      } else if (pair.upToDate) {
        marker = chalk.green(' [UP TO DATE]');
      } else {
        marker = chalk.yellow(' [STALE]');
      }
      console.log(`  ${name}${marker}`);
      console.log(chalk.gray(`    compiler: ${pair.compiler.path ?? 'not found'} (${pair.compiler.intelliSenseMode})`));
    }

    console.log('');
  }

  /**
   * Forget every stored hash so the next update rewrites the document.
   */
  async clean(): Promise<string[]> {
    const removed = await this.hashes.clear();
    const statePath = path.join(this.vscodeDir, STATE_FILE);
    if (await fs.pathExists(statePath)) {
      await fs.remove(statePath);
    }
    console.log(chalk.green('✓'), `Removed ${removed.length} hash record(s)`);
    return removed;
  }

  static async initProject(workspaceRoot: string = process.cwd()): Promise<boolean> {
    const settingsPath = path.join(workspaceRoot, SETTINGS_FILE);

    if (await fs.pathExists(settingsPath)) {
      console.log(chalk.yellow('IntelliSense sync is already initialized'));
      return false;
    }

    await fs.writeJson(settingsPath, DEFAULT_SETTINGS, { spaces: 2 });
    console.log(chalk.green('✓'), `Created ${SETTINGS_FILE}`);
    console.log(chalk.gray('\nNext steps:'));
    console.log(chalk.gray('1. Run "conan install" and "cmake --preset <name>" to configure a build'));
    console.log(chalk.gray('2. Run "intellisense-sync update" to generate .vscode/c_cpp_properties.json'));
    return true;
  }
}

export default IntelliSenseSync;
