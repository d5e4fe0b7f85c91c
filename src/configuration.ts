import { CMakeCacheInfo, CompilerInfo, ConfigurationDocument, ConfigurationEntry, PackageMetadata, Settings } from './types';
import { PROPERTIES_COMMENT, PROPERTIES_VERSION } from './constants';

function sorted(values: Set<string>): string[] {
  return [...values].sort();
}

export function buildIncludePath(metadata: PackageMetadata, settings: Settings): string[] {
  return [...settings.baseIncludePaths, ...sorted(metadata.includeDirs)];
}

export function buildDefines(buildType: string, metadata: PackageMetadata, settings: Settings): string[] {
  return [
    ...settings.baseDefines,
    buildType === 'Debug' ? '_DEBUG' : 'NDEBUG',
    ...sorted(metadata.defines)
  ];
}

export interface EntryInput {
  preset: string;
  buildType: string;
  metadata: PackageMetadata;
  cache: CMakeCacheInfo;
  compiler: CompilerInfo;
  settings: Settings;
  platform: NodeJS.Platform;
}

/**
 * Merge package metadata, cache data and the detected compiler into one
 * cpptools configuration. The compiler recorded in the CMake cache wins
 * over the detected one.
 */
export function createConfigurationEntry(input: EntryInput): ConfigurationEntry {
  const { preset, buildType, metadata, cache, compiler, settings } = input;

  const entry: ConfigurationEntry = {
    name: `${preset}-${buildType}`,
    configurationProvider: settings.configurationProvider,
    includePath: buildIncludePath(metadata, settings),
    defines: buildDefines(buildType, metadata, settings),
    compilerPath: cache.compilerPath ?? compiler.path ?? '',
    cStandard: settings.cStandard,
    cppStandard: settings.cppStandard,
    intelliSenseMode: compiler.intelliSenseMode
  };

  if (input.platform === 'darwin' && metadata.frameworkDirs.size > 0) {
    entry.macFrameworkPath = sorted(metadata.frameworkDirs);
  }

  return entry;
}

export function createDocument(configurations: ConfigurationEntry[]): ConfigurationDocument {
  return {
    version: PROPERTIES_VERSION,
    configurations,
    $comment: PROPERTIES_COMMENT
  };
}
