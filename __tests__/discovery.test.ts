import * as fs from 'fs-extra';
import * as path from 'path';
import { discoverBuildDirectories, extractPresetName, resolveBuildDirectories } from '../src/discovery';
import { createBuildDir, createWorkspace } from './helpers/workspace';

describe('Directory discovery', () => {
  describe('extractPresetName', () => {
    it('should read the preset from build/<preset>/build', () => {
      expect(extractPresetName('/ws/build/myPreset/build')).toBe('myPreset');
    });

    it('should prefer the match nearest the end of the path', () => {
      expect(extractPresetName('/build/ws/build/release/build')).toBe('release');
    });

    it('should fall back to the parent of a build directory', () => {
      expect(extractPresetName('/ws/out/ninja-debug/build')).toBe('ninja-debug');
    });

    it('should fall back to the directory name', () => {
      expect(extractPresetName('/ws/out/custom')).toBe('custom');
    });
  });

  describe('discoverBuildDirectories', () => {
    let workspace: string;

    beforeEach(async () => {
      workspace = await createWorkspace();
    });

    afterEach(async () => {
      await fs.remove(workspace);
    });

    it('should find configured preset build directories in order', async () => {
      await createBuildDir(workspace, 'release', ['CMAKE_BUILD_TYPE:STRING=Release']);
      await createBuildDir(workspace, 'debug', ['CMAKE_BUILD_TYPE:STRING=Debug']);

      const dirs = await discoverBuildDirectories(workspace);

      expect(dirs).toEqual([
        {
          path: path.join(workspace, 'build', 'debug', 'build'),
          preset: 'debug',
          cacheFile: path.join(workspace, 'build', 'debug', 'build', 'CMakeCache.txt')
        },
        {
          path: path.join(workspace, 'build', 'release', 'build'),
          preset: 'release',
          cacheFile: path.join(workspace, 'build', 'release', 'build', 'CMakeCache.txt')
        }
      ]);
    });

    it('should skip directories that do not follow the layout', async () => {
      await createBuildDir(workspace, 'good', ['CMAKE_BUILD_TYPE:STRING=Debug']);
      await fs.ensureDir(path.join(workspace, 'build', 'unconfigured', 'build'));
      await fs.ensureDir(path.join(workspace, 'build', 'flat'));
      await fs.writeFile(path.join(workspace, 'build', 'flat', 'CMakeCache.txt'), '');
      await fs.writeFile(path.join(workspace, 'build', 'notes.txt'), 'not a preset');

      const dirs = await discoverBuildDirectories(workspace);

      expect(dirs.map(dir => dir.preset)).toEqual(['good']);
    });

    it('should return nothing without a build directory', async () => {
      expect(await discoverBuildDirectories(workspace)).toEqual([]);
    });

    it('should honour an explicit build directory', async () => {
      const custom = path.join(workspace, 'out', 'build');
      await fs.ensureDir(custom);

      const dirs = await resolveBuildDirectories(workspace, custom);

      expect(dirs).toEqual([{ path: custom, preset: 'out', cacheFile: path.join(custom, 'CMakeCache.txt') }]);
    });

    it('should return nothing for a missing explicit build directory', async () => {
      expect(await resolveBuildDirectories(workspace, path.join(workspace, 'missing'))).toEqual([]);
    });
  });
});
