import * as fs from 'fs-extra';
import * as path from 'path';
import { BuildDirectory } from './types';
import { BUILD_DIR_NAME, CMAKE_CACHE_FILE } from './constants';

/**
 * Derive the preset name from a `.../build/<preset>/build` directory. The
 * match nearest the end of the path wins so that a workspace that itself
 * lives under a `build` directory is not mistaken for a preset.
 */
export function extractPresetName(buildDir: string): string {
  const parts = path.resolve(buildDir).split(path.sep).filter(part => part.length > 0);

  for (let i = parts.length - 3; i >= 0; i--) {
    if (parts[i] === BUILD_DIR_NAME && parts[i + 2] === BUILD_DIR_NAME) {
      return parts[i + 1];
    }
  }

  const name = path.basename(buildDir);
  if (name === BUILD_DIR_NAME) {
    return path.basename(path.dirname(path.resolve(buildDir)));
  }
  return name;
}

function toBuildDirectory(dir: string): BuildDirectory {
  return {
    path: dir,
    preset: extractPresetName(dir),
    cacheFile: path.join(dir, CMAKE_CACHE_FILE)
  };
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find every `build/<preset>/build/` directory under the workspace that has
 * been configured, i.e. holds a CMakeCache.txt.
 */
export async function discoverBuildDirectories(workspaceRoot: string): Promise<BuildDirectory[]> {
  const buildRoot = path.join(workspaceRoot, BUILD_DIR_NAME);
  if (!await isDirectory(buildRoot)) {
    return [];
  }

  const presets = (await fs.readdir(buildRoot)).sort();
  const found: BuildDirectory[] = [];

  for (const preset of presets) {
    const inner = path.join(buildRoot, preset, BUILD_DIR_NAME);
    if (await isDirectory(inner) && await fs.pathExists(path.join(inner, CMAKE_CACHE_FILE))) {
      found.push(toBuildDirectory(inner));
    }
  }

  return found;
}

export async function resolveBuildDirectories(workspaceRoot: string, override?: string): Promise<BuildDirectory[]> {
  if (override === undefined) {
    return discoverBuildDirectories(workspaceRoot);
  }
  const dir = path.resolve(override);
  return await fs.pathExists(dir) ? [toBuildDirectory(dir)] : [];
}
