import * as fs from 'fs-extra';
import { CMakeCacheInfo } from './types';
import { DEFAULT_BUILD_TYPE } from './constants';

export interface CacheEntry {
  key: string;
  type: string;
  value: string;
}

/**
 * Parse the contents of a CMakeCache.txt file into a map of entries.
 * Lines that are comments (`//` doc strings or `#`) or that do not look like
 * `KEY:TYPE=VALUE` are skipped.
 */
export function parseCache(content: string): Map<string, CacheEntry> {
  const entries = new Map<string, CacheEntry>();
  const lines = content.split(/\r\n|\n|\r/);

  for (const line of lines) {
    if (!line.trim() || line.startsWith('//') || /^\s*#/.test(line)) {
      continue;
    }
    const match = /^("(.*?)"|(.*?)):([^:]*?)=(.*)$/.exec(line);
    if (!match) {
      continue;
    }
    const [, , quotedName, unquotedName, type, value] = match;
    const key = quotedName || unquotedName;
    if (!key || !type) {
      continue;
    }
    entries.set(key, { key, type, value });
  }

  return entries;
}

function valueOf(entries: Map<string, CacheEntry>, key: string): string | undefined {
  const value = entries.get(key)?.value.trim();
  return value ? value : undefined;
}

export function extractCacheInfo(entries: Map<string, CacheEntry>): CMakeCacheInfo {
  const info: CMakeCacheInfo = {};

  const compilerPath = valueOf(entries, 'CMAKE_CXX_COMPILER');
  if (compilerPath) info.compilerPath = compilerPath;

  const buildType = valueOf(entries, 'CMAKE_BUILD_TYPE');
  if (buildType) info.buildType = buildType;

  const configurationTypes = valueOf(entries, 'CMAKE_CONFIGURATION_TYPES');
  if (configurationTypes) {
    info.configurationTypes = configurationTypes.split(';').map(t => t.trim()).filter(t => t.length > 0);
  }

  const generator = valueOf(entries, 'CMAKE_GENERATOR');
  if (generator) info.generator = generator;

  return info;
}

/**
 * Read the fields of interest from a CMake cache file. A missing file reads
 * as an empty result.
 */
export async function readCMakeCache(cacheFile: string): Promise<CMakeCacheInfo> {
  if (!await fs.pathExists(cacheFile)) {
    return {};
  }
  const content = await fs.readFile(cacheFile, 'utf8');
  return extractCacheInfo(parseCache(content));
}

export function isMultiConfig(info: CMakeCacheInfo): boolean {
  return (info.configurationTypes?.length ?? 0) > 1;
}

/**
 * The build types to synthesize for a build directory: every configuration
 * type of a multi-config generator, otherwise the active build type.
 */
export function buildTypesOf(info: CMakeCacheInfo): string[] {
  if (isMultiConfig(info) && info.configurationTypes) {
    return [...info.configurationTypes];
  }
  return [info.buildType ?? DEFAULT_BUILD_TYPE];
}
