export interface Settings {
  cStandard: string;
  cppStandard: string;
  configurationProvider: string;
  baseIncludePaths: string[];
  baseDefines: string[];
  requireCMakeTools: boolean;
}

export interface BuildDirectory {
  path: string;
  preset: string;
  cacheFile: string;
}

export interface CMakeCacheInfo {
  compilerPath?: string;
  buildType?: string;
  configurationTypes?: string[];
  generator?: string;
}

/** Fields pulled out of a single Conan `*-data.cmake` file. */
export interface PackageData {
  includeDirs: string[];
  defines: string[];
  frameworkDirs: string[];
  frameworks: string[];
  packageFolder?: string;
  /** Variable references that could not be resolved, e.g. `${zlib_PACKAGE_FOLDER_DEBUG}` */
  unresolved: string[];
}

export interface PackageMetadata {
  includeDirs: Set<string>;
  defines: Set<string>;
  frameworkDirs: Set<string>;
  frameworks: Set<string>;
}

export type ProbeResult =
  | { kind: 'found'; path: string }
  | { kind: 'not-found' }
  | { kind: 'probe-error'; reason: string };

export interface CompilerInfo {
  path?: string;
  intelliSenseMode: string;
}

export interface ConfigurationEntry {
  name: string;
  configurationProvider: string;
  includePath: string[];
  defines: string[];
  compilerPath: string;
  cStandard: string;
  cppStandard: string;
  intelliSenseMode: string;
  macFrameworkPath?: string[];
}

export interface ConfigurationDocument {
  version: number;
  configurations: ConfigurationEntry[];
  $comment: string;
}

export interface SynthesizedEntry {
  entry: ConfigurationEntry;
  preset: string;
  buildType: string;
  digest: string;
  changed: boolean;
}

export type SyncOutcome =
  | { kind: 'updated'; entries: ConfigurationEntry[]; documentPath: string }
  | { kind: 'unchanged'; entries: ConfigurationEntry[] }
  | { kind: 'no-entries' };

export interface State {
  /** An extension indicator was seen in the workspace */
  cmakeToolsValidated: boolean;
  /** The install hint has already been printed once */
  cmakeToolsAdvised: boolean;
}

export interface PairStatus {
  preset: string;
  buildType: string;
  configured: boolean;
  upToDate: boolean;
  compiler: CompilerInfo;
}
