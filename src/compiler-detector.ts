import * as fs from 'fs-extra';
import * as path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import fg from 'fast-glob';
import which from 'which';
import { CompilerInfo, ProbeResult } from './types';

const execFileAsync = promisify(execFile);

const CL_EXE_PATTERN = 'VC/Tools/MSVC/*/bin/Hostx64/x64/cl.exe';

/**
 * The side effects compiler detection needs. Every method reports failure
 * through its result, never by throwing.
 */
export interface ProbeRunner {
  /** Run a tool and report its trimmed stdout as the found path. */
  run(command: string, args: string[]): Promise<ProbeResult>;
  /** Look an executable up on PATH. */
  which(name: string): Promise<ProbeResult>;
  /** Files matching `pattern` under `cwd`, as absolute paths. */
  glob(pattern: string, cwd: string): Promise<string[]>;
  exists(filePath: string): Promise<boolean>;
}

export interface DetectOptions {
  platform?: NodeJS.Platform;
  arch?: string;
  env?: NodeJS.ProcessEnv;
  runner?: ProbeRunner;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const processRunner: ProbeRunner = {
  async run(command, args) {
    try {
      const { stdout } = await execFileAsync(command, args, { encoding: 'utf8', windowsHide: true });
      const output = stdout.trim();
      return output ? { kind: 'found', path: output } : { kind: 'not-found' };
    } catch (error) {
      return { kind: 'probe-error', reason: reasonOf(error) };
    }
  },

  async which(name) {
    try {
      const resolved = await which(name, { nothrow: true });
      return resolved ? { kind: 'found', path: resolved } : { kind: 'not-found' };
    } catch (error) {
      return { kind: 'probe-error', reason: reasonOf(error) };
    }
  },

  async glob(pattern, cwd) {
    try {
      return await fg(pattern, { cwd, absolute: true, onlyFiles: true });
    } catch {
      return [];
    }
  },

  exists(filePath) {
    return fs.pathExists(filePath);
  }
};

export function intelliSenseArch(arch: string): string {
  return arch === 'arm64' ? 'arm64' : 'x64';
}

function pathOf(result: ProbeResult): string | undefined {
  return result.kind === 'found' ? result.path : undefined;
}

export async function probeMsvc(runner: ProbeRunner, env: NodeJS.ProcessEnv): Promise<ProbeResult> {
  const programFiles = env['ProgramFiles(x86)'] || 'C:\\Program Files (x86)';
  const vswhere = path.win32.join(programFiles, 'Microsoft Visual Studio', 'Installer', 'vswhere.exe');

  if (await runner.exists(vswhere)) {
    const install = await runner.run(vswhere, ['-latest', '-property', 'installationPath']);
    if (install.kind === 'found') {
      // Toolset directories are version numbers; the last one sorted is the newest.
      const candidates = (await runner.glob(CL_EXE_PATTERN, install.path)).sort();
      if (candidates.length > 0) {
        return { kind: 'found', path: candidates[candidates.length - 1] };
      }
    }
  }

  return runner.which('cl');
}

export async function probeXcodeClang(runner: ProbeRunner): Promise<ProbeResult> {
  const result = await runner.run('xcrun', ['--find', 'clang']);
  if (result.kind === 'found') {
    return result;
  }
  return runner.which('clang');
}

/**
 * Locate the default C++ compiler for the host and the IntelliSense mode
 * cpptools expects for it. The mode is always set, even when no compiler
 * was found.
 */
export async function detectCompiler(options: DetectOptions = {}): Promise<CompilerInfo> {
  const platform = options.platform ?? process.platform;
  const arch = intelliSenseArch(options.arch ?? process.arch);
  const env = options.env ?? process.env;
  const runner = options.runner ?? processRunner;

  if (platform === 'win32') {
    return { path: pathOf(await probeMsvc(runner, env)), intelliSenseMode: `windows-msvc-${arch}` };
  }

  if (platform === 'darwin') {
    return { path: pathOf(await probeXcodeClang(runner)), intelliSenseMode: `macos-clang-${arch}` };
  }

  const gcc = pathOf(await runner.which('gcc'));
  if (gcc) {
    return { path: gcc, intelliSenseMode: `linux-gcc-${arch}` };
  }

  const clang = pathOf(await runner.which('clang'));
  if (clang) {
    return { path: clang, intelliSenseMode: `linux-clang-${arch}` };
  }

  return { intelliSenseMode: `linux-gcc-${arch}` };
}
