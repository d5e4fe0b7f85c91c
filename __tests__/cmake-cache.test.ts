import * as fs from 'fs-extra';
import * as path from 'path';
import { buildTypesOf, extractCacheInfo, isMultiConfig, parseCache, readCMakeCache } from '../src/cmake-cache';
import { createWorkspace } from './helpers/workspace';

const SAMPLE_CACHE = [
  '# This is the CMakeCache file.',
  '# For build in directory: /ws/build/default/build',
  '',
  '//CXX compiler',
  'CMAKE_CXX_COMPILER:FILEPATH=/usr/bin/g++',
  '',
  '//Choose the type of build.',
  'CMAKE_BUILD_TYPE:STRING=Release',
  'CMAKE_GENERATOR:INTERNAL=Ninja',
  '"ODD:NAME":STRING=quoted',
  'this line is not an entry'
].join('\n');

describe('CMake cache reader', () => {
  describe('parseCache', () => {
    it('should parse typed entries and skip comments', () => {
      const entries = parseCache(SAMPLE_CACHE);

      expect(entries.get('CMAKE_CXX_COMPILER')).toEqual({
        key: 'CMAKE_CXX_COMPILER',
        type: 'FILEPATH',
        value: '/usr/bin/g++'
      });
      expect(entries.get('CMAKE_GENERATOR')?.type).toBe('INTERNAL');
      expect(entries.size).toBe(4);
    });

    it('should unquote quoted keys', () => {
      const entries = parseCache(SAMPLE_CACHE);
      expect(entries.get('ODD:NAME')?.value).toBe('quoted');
    });

    it('should handle CRLF line endings', () => {
      const entries = parseCache('CMAKE_BUILD_TYPE:STRING=Debug\r\nCMAKE_GENERATOR:INTERNAL=Ninja\r\n');
      expect(entries.get('CMAKE_BUILD_TYPE')?.value).toBe('Debug');
      expect(entries.get('CMAKE_GENERATOR')?.value).toBe('Ninja');
    });
  });

  describe('extractCacheInfo', () => {
    it('should extract the fields of interest', () => {
      expect(extractCacheInfo(parseCache(SAMPLE_CACHE))).toEqual({
        compilerPath: '/usr/bin/g++',
        buildType: 'Release',
        generator: 'Ninja'
      });
    });

    it('should treat empty values as absent', () => {
      const info = extractCacheInfo(parseCache('CMAKE_BUILD_TYPE:STRING=\nCMAKE_CXX_COMPILER:FILEPATH=   \n'));
      expect(info).toEqual({});
    });

    it('should split configuration types and drop empty items', () => {
      const info = extractCacheInfo(parseCache('CMAKE_CONFIGURATION_TYPES:STRING=Debug;Release;\n'));
      expect(info.configurationTypes).toEqual(['Debug', 'Release']);
    });
  });

  describe('buildTypesOf', () => {
    it('should fan out multi-config generators', () => {
      const info = { configurationTypes: ['Debug', 'Release', 'RelWithDebInfo'], buildType: 'Debug' };
      expect(isMultiConfig(info)).toBe(true);
      expect(buildTypesOf(info)).toEqual(['Debug', 'Release', 'RelWithDebInfo']);
    });

    it('should use the active build type for a single configuration type', () => {
      const info = { configurationTypes: ['Debug'], buildType: 'Release' };
      expect(isMultiConfig(info)).toBe(false);
      expect(buildTypesOf(info)).toEqual(['Release']);
    });

    it('should default to Debug', () => {
      expect(buildTypesOf({})).toEqual(['Debug']);
    });
  });

  describe('readCMakeCache', () => {
    let workspace: string;

    beforeEach(async () => {
      workspace = await createWorkspace();
    });

    afterEach(async () => {
      await fs.remove(workspace);
    });

    it('should read a cache file from disk', async () => {
      const cacheFile = path.join(workspace, 'CMakeCache.txt');
      await fs.writeFile(cacheFile, SAMPLE_CACHE);

      const info = await readCMakeCache(cacheFile);
      expect(info.buildType).toBe('Release');
      expect(info.compilerPath).toBe('/usr/bin/g++');
    });

    it('should return an empty result for a missing file', async () => {
      expect(await readCMakeCache(path.join(workspace, 'missing.txt'))).toEqual({});
    });
  });
});
