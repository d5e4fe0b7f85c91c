import Joi from 'joi';
import { Settings } from './types';

export const SETTINGS_FILE = 'intellisense-sync.json';
export const VSCODE_DIR = '.vscode';
export const PROPERTIES_FILE = 'c_cpp_properties.json';
export const STATE_FILE = '.intellisense-sync-state.json';
export const HASH_FILE_PREFIX = '.conan_hash_';

export const CMAKE_CACHE_FILE = 'CMakeCache.txt';
export const BUILD_DIR_NAME = 'build';
export const GENERATORS_DIR_NAME = 'generators';

export const DEFAULT_BUILD_TYPE = 'Debug';
export const PROPERTIES_VERSION = 4;
export const PROPERTIES_COMMENT =
  'CMake Tools extension provides primary IntelliSense via compile_commands.json. Explicit paths serve as fallback.';

export const CMAKE_TOOLS_INDICATORS = ['cmake-tools-kits.json', '.cmaketools.json'];
export const CMAKE_TOOLS_MARKETPLACE_URL =
  'https://marketplace.visualstudio.com/items?itemName=ms-vscode.cmake-tools';

export const DEFAULT_SETTINGS: Settings = {
  cStandard: 'c17',
  cppStandard: 'c++20',
  configurationProvider: 'ms-vscode.cmake-tools',
  baseIncludePaths: [
    '${workspaceFolder}/**',
    '${workspaceFolder}/include',
    '${workspaceFolder}/src'
  ],
  baseDefines: ['UNICODE', '_UNICODE'],
  requireCMakeTools: false
};

export const settingsSchema = Joi.object<Settings>({
  cStandard: Joi.string().default(DEFAULT_SETTINGS.cStandard),
  cppStandard: Joi.string().default(DEFAULT_SETTINGS.cppStandard),
  configurationProvider: Joi.string().default(DEFAULT_SETTINGS.configurationProvider),
  baseIncludePaths: Joi.array().items(Joi.string()).default(DEFAULT_SETTINGS.baseIncludePaths),
  baseDefines: Joi.array().items(Joi.string()).default(DEFAULT_SETTINGS.baseDefines),
  requireCMakeTools: Joi.boolean().default(DEFAULT_SETTINGS.requireCMakeTools)
}).required();
