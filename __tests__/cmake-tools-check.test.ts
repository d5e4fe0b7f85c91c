import * as fs from 'fs-extra';
import * as path from 'path';
import { checkCMakeTools, loadState } from '../src/cmake-tools-check';
import { createWorkspace } from './helpers/workspace';

jest.mock('chalk', () => ({
  green: jest.fn((text: string) => text),
  red: jest.fn((text: string) => text),
  yellow: jest.fn((text: string) => text),
  blue: jest.fn((text: string) => text),
  cyan: jest.fn((text: string) => text),
  gray: jest.fn((text: string) => text),
  bold: jest.fn((text: string) => text)
}));

const STATE_FILE = '.intellisense-sync-state.json';

describe('CMake Tools check', () => {
  let vscodeDir: string;
  let consoleWarnSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(async () => {
    vscodeDir = await createWorkspace();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(async () => {
    consoleWarnSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    await fs.remove(vscodeDir);
  });

  it('should pass and remember when an indicator exists', async () => {
    await fs.writeJson(path.join(vscodeDir, 'cmake-tools-kits.json'), []);

    expect(await checkCMakeTools(vscodeDir)).toBe(true);
    expect(await fs.readJson(path.join(vscodeDir, STATE_FILE))).toEqual({
      cmakeToolsValidated: true,
      cmakeToolsAdvised: false
    });
    expect(consoleWarnSpy).not.toHaveBeenCalled();
  });

  it('should pass from the stored state without looking again', async () => {
    await fs.writeJson(path.join(vscodeDir, STATE_FILE), { cmakeToolsValidated: true });

    expect(await checkCMakeTools(vscodeDir, true)).toBe(true);
  });

  it('should advise once when no indicator exists', async () => {
    expect(await checkCMakeTools(vscodeDir)).toBe(true);
    expect(await checkCMakeTools(vscodeDir)).toBe(true);

    expect(consoleWarnSpy).toHaveBeenCalledTimes(2);
    expect(consoleWarnSpy).toHaveBeenCalledWith(
      'Note:',
      'CMake Tools extension indicators not found. Extension is recommended.'
    );
    expect(await loadState(vscodeDir)).toEqual({ cmakeToolsValidated: false, cmakeToolsAdvised: true });
  });

  it('should fail in strict mode without remembering anything', async () => {
    expect(await checkCMakeTools(vscodeDir, true)).toBe(false);

    expect(consoleErrorSpy).toHaveBeenCalledWith('Error:', 'CMake Tools extension indicators not found.');
    expect(await fs.pathExists(path.join(vscodeDir, STATE_FILE))).toBe(false);
  });

  it('should still fail in strict mode after an advisory run', async () => {
    await checkCMakeTools(vscodeDir);
    expect(await checkCMakeTools(vscodeDir, true)).toBe(false);
  });

  it('should recover from a corrupted state file', async () => {
    await fs.writeFile(path.join(vscodeDir, STATE_FILE), 'invalid json');

    expect(await loadState(vscodeDir)).toEqual({ cmakeToolsValidated: false, cmakeToolsAdvised: false });
    expect(consoleWarnSpy).toHaveBeenCalledWith('Warning:', 'Could not load state file, creating new one');
  });
});
