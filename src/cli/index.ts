#!/usr/bin/env node

// CLI entry point
import { Command } from 'commander';
import * as readline from 'readline';
import * as path from 'path';
import { EnhancedLogger } from '../core/logger';
import { FileOrganizer } from '../core/file-organizer';
import { OrganizerConfigManager } from '../core/config-manager';
import { loadEnvironmentConfig, validateEnvironmentConfig } from '../core/environment-config';
import { describeError } from '../core/errors';
import { CLIProgressDisplay } from '../progress/cli-progress-display';
import {
  ShellSession,
  SHELL_HELP,
  describeUserError,
  formatCategoryList,
  formatExcludeList,
  parseOneBasedIndex,
} from './shell';

type GlobalOptions = {
  config?: string;
};

interface OrganizeCommandOptions {
  date?: boolean;
  copy?: boolean;
  exclude?: string[];
  verbose?: boolean;
  yes?: boolean;
}

const program = new Command();

program
  .name('file-organizer')
  .description('Sort the files of a directory into category folders by extension')
  .version('1.0.0')
  .option('-c, --config <file>', 'Use a specific configuration file');

// Helper function to create readline interface and prompt user for input
function promptUser(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function createLogger(verbose: boolean): EnhancedLogger {
  const environment = loadEnvironmentConfig();
  const validation = validateEnvironmentConfig();
  for (const warning of validation.warnings) {
    console.warn(`⚠️  ${warning}`);
  }

  return new EnhancedLogger({
    level: environment.logging.level,
    logFilePath: environment.logging.filePath,
    enableConsole: verbose,
    component: 'cli',
  });
}

async function createOrganizer(logger: EnhancedLogger): Promise<FileOrganizer> {
  const { config } = program.opts<GlobalOptions>();
  const configPath = path.resolve(config ?? loadEnvironmentConfig().configPath);
  return FileOrganizer.create({ configPath, logger });
}

// Report an error the user can act on and exit; anything else propagates
function exitWithError(error: unknown): never {
  console.error(`❌ ${describeUserError(error)}`);
  process.exit(1);
}

program
  .command('organize')
  .description('Organize the files at the top level of a directory')
  .argument('<directory>', 'Directory to organize')
  .option('-d, --date', 'Group files into YYYY-MM-DD folders by modification date')
  .option('--copy', 'Copy files instead of moving them')
  .option('-e, --exclude <pattern...>', 'Add exclude patterns (saved to the configuration)')
  .option('-v, --verbose', 'Show every file and log to the console')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (directory: string, options: OrganizeCommandOptions) => {
    const logger = createLogger(options.verbose ?? false);
    const organizer = await createOrganizer(logger);

    for (const pattern of options.exclude ?? []) {
      if (!(await organizer.addExcludePattern(pattern))) {
        console.error(`❌ Invalid exclude pattern: ${pattern}`);
        process.exit(1);
      }
    }

    const targetDirectory = path.resolve(directory);
    if (!options.copy && !options.yes && process.stdin.isTTY) {
      const answer = await promptUser(`Move the files in ${targetDirectory} into category folders? (y/n): `);
      if (answer.toLowerCase() !== 'y') {
        console.log('Cancelled.');
        return;
      }
    }

    const display = new CLIProgressDisplay(organizer.progress, { showDetails: options.verbose ?? false });
    display.start();

    const startTime = Date.now();
    try {
      await organizer.run(targetDirectory, {
        organizeByDate: options.date ?? false,
        copyInsteadOfMove: options.copy ?? false,
      });
    } catch (error) {
      exitWithError(error);
    } finally {
      display.stop();
    }

    console.log(`\n${organizer.getSummaryText()}`);
    console.log(`Completed in ${((Date.now() - startTime) / 1000).toFixed(2)}s`);
    console.log(`📄 Log file: ${logger.getLogFilePath() ?? 'disabled'}`);
  });

const categoriesCommand = program.command('categories').description('Manage file categories');

categoriesCommand
  .command('list', { isDefault: true })
  .description('List categories in matching order')
  .action(async () => {
    const organizer = await createOrganizer(createLogger(false));
    console.log(formatCategoryList(organizer.listCategories()));
  });

categoriesCommand
  .command('add')
  .description('Add a category')
  .argument('<name>', 'Category (and folder) name')
  .argument('<extensions>', 'Comma-separated extensions, e.g. "jpg,png"')
  .action(async (name: string, extensions: string) => {
    const organizer = await createOrganizer(createLogger(false));
    try {
      const rule = organizer.addCategory(name, extensions);
      await organizer.saveConfig();
      console.log(`✅ Added category ${rule.name}: ${rule.extensions.join(', ')}`);
    } catch (error) {
      exitWithError(error);
    }
  });

categoriesCommand
  .command('edit')
  .description('Replace the extensions of a category')
  .argument('<number>', 'Category number as shown by "categories list"', parseOneBasedIndex)
  .argument('<extensions>', 'Comma-separated extensions')
  .action(async (index: number, extensions: string) => {
    const organizer = await createOrganizer(createLogger(false));
    try {
      const rule = organizer.updateCategory(index, extensions);
      await organizer.saveConfig();
      console.log(`✅ Updated category ${rule.name}: ${rule.extensions.join(', ')}`);
    } catch (error) {
      exitWithError(error);
    }
  });

categoriesCommand
  .command('remove')
  .description('Remove a category')
  .argument('<number>', 'Category number as shown by "categories list"', parseOneBasedIndex)
  .action(async (index: number) => {
    const organizer = await createOrganizer(createLogger(false));
    try {
      const removed = organizer.removeCategory(index);
      await organizer.saveConfig();
      console.log(`✅ Removed category ${removed.name}`);
    } catch (error) {
      exitWithError(error);
    }
  });

const excludeCommand = program.command('exclude').description('Manage exclude patterns');

excludeCommand
  .command('list', { isDefault: true })
  .description('List exclude patterns')
  .action(async () => {
    const organizer = await createOrganizer(createLogger(false));
    console.log(formatExcludeList(organizer.listExcludePatterns()));
  });

excludeCommand
  .command('add')
  .description('Skip files whose name matches a regular expression')
  .argument('<pattern>', 'Regular expression')
  .action(async (pattern: string) => {
    const organizer = await createOrganizer(createLogger(false));
    if (!(await organizer.addExcludePattern(pattern))) {
      console.error(`❌ Invalid exclude pattern: ${pattern}`);
      process.exit(1);
    }
    console.log(`✅ Added exclude pattern: ${pattern}`);
  });

excludeCommand
  .command('remove')
  .description('Remove an exclude pattern')
  .argument('<number>', 'Pattern number as shown by "exclude list"', parseOneBasedIndex)
  .action(async (index: number) => {
    const organizer = await createOrganizer(createLogger(false));
    try {
      const removed = await organizer.removeExcludePattern(index);
      console.log(`✅ Removed exclude pattern: ${removed}`);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command('shell', { isDefault: true })
  .description('Start an interactive session (default)')
  .option('-v, --verbose', 'Show every file and log to the console')
  .action(async (options: { verbose?: boolean }) => {
    const logger = createLogger(options.verbose ?? false);
    const organizer = await createOrganizer(logger);
    const display = new CLIProgressDisplay(organizer.progress, { showDetails: options.verbose ?? false });
    display.start();

    const session = new ShellSession(organizer, logger, (text) => console.log(text));
    const summary = OrganizerConfigManager.getConfigSummary(organizer.getConfig());

    console.log('📁 File Organizer');
    console.log(`   Configuration: ${organizer.getConfigPath() ?? 'none'}`);
    for (const [label, value] of Object.entries(summary)) {
      console.log(`   ${label}: ${value}`);
    }
    console.log(`\n${SHELL_HELP}\n`);

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: 'organizer> ',
    });

    try {
      rl.prompt();
      for await (const line of rl) {
        try {
          if (!(await session.execute(line))) {
            break;
          }
        } catch (error) {
          logger.error(`Unexpected error: ${describeError(error)}`);
          console.error(`❌ Unexpected error: ${describeError(error)}`);
        }
        rl.prompt();
      }
    } finally {
      rl.close();
      display.stop();
    }

    console.log('Goodbye!');
  });

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Command failed:', describeError(error));
  process.exit(1);
});
