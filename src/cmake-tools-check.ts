import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import { State } from './types';
import { CMAKE_TOOLS_INDICATORS, CMAKE_TOOLS_MARKETPLACE_URL, STATE_FILE } from './constants';

const EMPTY_STATE: State = { cmakeToolsValidated: false, cmakeToolsAdvised: false };

function flag(raw: object, key: keyof State): boolean {
  const value: unknown = Reflect.get(raw, key);
  return value === true;
}

export async function loadState(vscodeDir: string): Promise<State> {
  const statePath = path.join(vscodeDir, STATE_FILE);
  if (!await fs.pathExists(statePath)) {
    return { ...EMPTY_STATE };
  }
  try {
    const raw: unknown = await fs.readJson(statePath);
    if (typeof raw !== 'object' || raw === null) {
      return { ...EMPTY_STATE };
    }
    return {
      cmakeToolsValidated: flag(raw, 'cmakeToolsValidated'),
      cmakeToolsAdvised: flag(raw, 'cmakeToolsAdvised')
    };
  } catch {
    console.warn(chalk.yellow('Warning:'), 'Could not load state file, creating new one');
    return { ...EMPTY_STATE };
  }
}

export async function saveState(vscodeDir: string, state: State): Promise<void> {
  await fs.ensureDir(vscodeDir);
  await fs.writeJson(path.join(vscodeDir, STATE_FILE), state, { spaces: 2 });
}

/**
 * Advisory check that the CMake Tools extension has been active in this
 * workspace. Without `strict` it always passes and prints the install hint
 * once. With `strict` a missing indicator fails the check.
 */
export async function checkCMakeTools(vscodeDir: string, strict = false): Promise<boolean> {
  const state = await loadState(vscodeDir);
  if (state.cmakeToolsValidated) {
    return true;
  }

  for (const indicator of CMAKE_TOOLS_INDICATORS) {
    if (await fs.pathExists(path.join(vscodeDir, indicator))) {
      await saveState(vscodeDir, { ...state, cmakeToolsValidated: true });
      return true;
    }
  }

  if (strict) {
    console.error(chalk.red('Error:'), 'CMake Tools extension indicators not found.');
    console.error(chalk.gray(`  Install from: ${CMAKE_TOOLS_MARKETPLACE_URL}`));
    return false;
  }

  if (!state.cmakeToolsAdvised) {
    await saveState(vscodeDir, { ...state, cmakeToolsAdvised: true });
    console.warn(chalk.yellow('Note:'), 'CMake Tools extension indicators not found. Extension is recommended.');
    console.warn(chalk.gray(`  Install from: ${CMAKE_TOOLS_MARKETPLACE_URL}`));
  }
  return true;
}
