#!/usr/bin/env node

import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { IntelliSenseSync } from './intellisense-sync';

interface WorkspaceOptions {
  workspaceRoot?: string;
  buildDir?: string;
}

interface UpdateCommandOptions extends WorkspaceOptions {
  requireCmakeTools?: boolean;
  detailedExitCode?: boolean;
}

interface CleanCommandOptions {
  workspaceRoot?: string;
  yes?: boolean;
}

export const EXIT_FATAL = 1;
export const EXIT_UNCHANGED = 2;

async function run(action: () => Promise<number>): Promise<void> {
  let code: number;
  try {
    code = await action();
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error(chalk.red('Error:'), errorMessage);
    code = EXIT_FATAL;
  }
  if (code !== 0) {
    process.exit(code);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('intellisense-sync')
    .description('Keep VS Code C/C++ IntelliSense configuration in sync with CMake and Conan build output')
    .version('1.0.0');

  program
    .command('update', { isDefault: true })
    .description('Regenerate .vscode/c_cpp_properties.json when Conan package data changed')
    .option('-w, --workspace-root <dir>', 'workspace root directory (default: current directory)')
    .option('-b, --build-dir <dir>', 'process only this build directory')
    .option('--require-cmake-tools', 'fail when the CMake Tools extension is not detected')
    .option('--detailed-exit-code', 'exit with code 2 when nothing changed')
    .action((options: UpdateCommandOptions) => run(async () => {
      const sync = new IntelliSenseSync({ workspaceRoot: options.workspaceRoot });
      await sync.init();

      const outcome = await sync.update({
        buildDir: options.buildDir,
        requireCMakeTools: options.requireCmakeTools
      });

      if (outcome.kind === 'updated') {
        console.log(chalk.green('✓'), 'Configuration updated successfully');
        return 0;
      }
      if (outcome.kind === 'unchanged') {
        return options.detailedExitCode ? EXIT_UNCHANGED : 0;
      }
      console.error(chalk.yellow('Warning:'), 'No build configurations found. Run CMake configure first.');
      return EXIT_FATAL;
    }));

  program
    .command('status')
    .description('Show discovered build configurations and whether they are up to date')
    .option('-w, --workspace-root <dir>', 'workspace root directory (default: current directory)')
    .option('-b, --build-dir <dir>', 'inspect only this build directory')
    .action((options: WorkspaceOptions) => run(async () => {
      const sync = new IntelliSenseSync({ workspaceRoot: options.workspaceRoot });
      await sync.init();
      await sync.checkStatus(options.buildDir);
      return 0;
    }));

  program
    .command('clean')
    .description('Forget stored hashes so the next update rewrites the configuration')
    .option('-w, --workspace-root <dir>', 'workspace root directory (default: current directory)')
    .option('-y, --yes', 'do not ask for confirmation')
    .action((options: CleanCommandOptions) => run(async () => {
      const sync = new IntelliSenseSync({ workspaceRoot: options.workspaceRoot });

      let confirm = options.yes === true;
      if (!confirm) {
        ({ confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: 'Remove all stored IntelliSense hashes?',
            default: false
          }
        ]));
      }

      if (confirm) {
        await sync.clean();
      }
      return 0;
    }));

  program
    .command('init')
    .description('Create an intellisense-sync.json settings file')
    .option('-w, --workspace-root <dir>', 'workspace root directory (default: current directory)')
    .action((options: WorkspaceOptions) => run(async () => {
      await IntelliSenseSync.initProject(options.workspaceRoot);
      return 0;
    }));

  return program;
}

export const program = createProgram();

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error');
    process.exit(EXIT_FATAL);
  });
}
