#!/usr/bin/env node

export { IntelliSenseSync } from './intellisense-sync';
export { default } from './intellisense-sync';
export * from './types';
export * from './constants';
export { readCMakeCache, parseCache, buildTypesOf, isMultiConfig } from './cmake-cache';
export { parseConanData, parseConanDataFile, parseStatements, scanGeneratorsDirectory } from './conan-data';
export { detectCompiler, processRunner } from './compiler-detector';
export type { ProbeRunner, DetectOptions } from './compiler-detector';
export { discoverBuildDirectories, extractPresetName } from './discovery';
export { HashStore, computeContentHash } from './hash-store';
export { checkCMakeTools } from './cmake-tools-check';
export { createConfigurationEntry, createDocument } from './configuration';

if (require.main === module) {
  import('./cli')
    .then(({ program }) => program.parseAsync(process.argv))
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
