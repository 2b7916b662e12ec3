// Interactive shell commands, shared by the `shell` command and its tests

import { InvalidArgumentError } from 'commander';
import { Logger } from '../types';
import { CategoryRuleSet } from '../core/category-rules';
import { IndexOutOfRangeError, OrganizerError, describeError } from '../core/errors';
import { FileOrganizer } from '../core/file-organizer';

export const SHELL_HELP = `Commands:
  organize <directory> [--date] [--copy]   Organize a directory
  undo                                     Undo the last move or copy
  stats                                    Show the summary of the last run
  categories                               List categories
  categories add <name> <ext,ext,...>      Add a category
  categories edit <number> <ext,ext,...>   Replace the extensions of a category
  categories remove <number>               Remove a category
  exclude                                  List exclude patterns
  exclude add <pattern>                    Add an exclude pattern
  exclude remove <number>                  Remove an exclude pattern
  save                                     Save categories and patterns
  help                                     Show this help
  exit                                     Leave the shell`;

/**
 * Parse a 1-based position typed by the user into a 0-based index
 */
export function parseOneBasedIndex(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`'${value}' is not a positive whole number`);
  }

  const position = Number.parseInt(value, 10);
  if (position < 1) {
    throw new InvalidArgumentError('Numbering starts at 1');
  }
  return position - 1;
}

export function formatCategoryList(rules: CategoryRuleSet): string {
  if (rules.length === 0) {
    return 'No categories configured';
  }
  return rules.map((rule, index) => `${index + 1}. ${rule.name}: ${rule.extensions.join(', ')}`).join('\n');
}

export function formatExcludeList(patterns: readonly string[]): string {
  if (patterns.length === 0) {
    return 'No exclude patterns';
  }
  return patterns.map((pattern, index) => `${index + 1}. ${pattern}`).join('\n');
}

/**
 * Message for errors the user can act on; anything else is rethrown
 */
export function describeUserError(error: unknown): string {
  if (error instanceof IndexOutOfRangeError) {
    return `There is no item number ${error.index + 1} (${error.length} listed)`;
  }
  if (error instanceof OrganizerError || error instanceof InvalidArgumentError) {
    return error.message;
  }
  throw error;
}

/**
 * Split a command line on whitespace, keeping quoted sections together
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  const matcher = /"([^"]*)"|'([^']*)'|(\S+)/g;

  for (const match of line.matchAll(matcher)) {
    tokens.push(match[1] ?? match[2] ?? match[3] ?? '');
  }

  return tokens;
}

/**
 * Strip one pair of matching quotes around the whole of `text`
 */
export function unquote(text: string): string {
  const match = /^(["'])([\s\S]*)\1$/.exec(text);
  return match ? match[2] : text;
}

/**
 * One interactive session. Every command runs against the same organizer, so
 * undo reaches back across all runs of the session.
 */
export class ShellSession {
  private readonly organizer: FileOrganizer;
  private readonly logger: Logger;
  private readonly print: (text: string) => void;

  constructor(organizer: FileOrganizer, logger: Logger, print: (text: string) => void) {
    this.organizer = organizer;
    this.logger = logger;
    this.print = print;
  }

  /**
   * Run one line of input. Resolves to false when the session should end.
   */
  async execute(line: string): Promise<boolean> {
    const [command, ...args] = tokenize(line);
    if (!command) {
      return true;
    }

    try {
      switch (command.toLowerCase()) {
        case 'organize':
          await this.organize(args);
          break;
        case 'undo':
          await this.undo();
          break;
        case 'stats':
          this.print(this.organizer.getSummaryText());
          break;
        case 'categories':
          this.categories(args);
          break;
        case 'exclude':
          await this.exclude(args, line);
          break;
        case 'save':
          await this.organizer.saveConfig();
          this.print('Configuration saved');
          break;
        case 'help':
          this.print(SHELL_HELP);
          break;
        case 'exit':
        case 'quit':
          return false;
        default:
          this.print(`Unknown command: ${command}. Type "help" for a list of commands.`);
      }
    } catch (error) {
      const message = describeUserError(error);
      this.logger.debug(`Shell command failed: ${command}`, { error: describeError(error) });
      this.print(`Error: ${message}`);
    }

    return true;
  }

  private async organize(args: string[]): Promise<void> {
    const flags = new Set(args.filter((arg) => arg.startsWith('--')));
    const directory = args.filter((arg) => !arg.startsWith('--')).join(' ');

    if (!directory) {
      this.print('Usage: organize <directory> [--date] [--copy]');
      return;
    }

    const startTime = Date.now();
    await this.organizer.run(directory, {
      organizeByDate: flags.has('--date'),
      copyInsteadOfMove: flags.has('--copy'),
    });

    this.print(this.organizer.getSummaryText());
    this.print(`Completed in ${((Date.now() - startTime) / 1000).toFixed(2)}s`);
  }

  private async undo(): Promise<void> {
    if (!this.organizer.canUndo()) {
      this.print('No operations to undo');
      return;
    }

    const undone = await this.organizer.undoLast();
    this.print(undone ? 'Last operation undone' : 'The last operation could not be undone; see the log for details');
  }

  private categories(args: string[]): void {
    const [action, ...rest] = args;

    switch (action) {
      case undefined:
      case 'list':
        this.print(formatCategoryList(this.organizer.listCategories()));
        return;
      case 'add': {
        const [name, ...extensions] = rest;
        if (!name || extensions.length === 0) {
          this.print('Usage: categories add <name> <ext,ext,...>');
          return;
        }
        const rule = this.organizer.addCategory(name, extensions.join(','));
        this.print(`Added category ${rule.name}: ${rule.extensions.join(', ')}`);
        return;
      }
      case 'edit': {
        const [position, ...extensions] = rest;
        if (!position || extensions.length === 0) {
          this.print('Usage: categories edit <number> <ext,ext,...>');
          return;
        }
        const rule = this.organizer.updateCategory(parseOneBasedIndex(position), extensions.join(','));
        this.print(`Updated category ${rule.name}: ${rule.extensions.join(', ')}`);
        return;
      }
      case 'remove': {
        const [position] = rest;
        if (!position) {
          this.print('Usage: categories remove <number>');
          return;
        }
        const removed = this.organizer.removeCategory(parseOneBasedIndex(position));
        this.print(`Removed category ${removed.name}`);
        return;
      }
      default:
        this.print(`Unknown categories action: ${action}`);
    }
  }

  private async exclude(args: string[], line: string): Promise<void> {
    const [action, ...rest] = args;

    switch (action) {
      case undefined:
      case 'list':
        this.print(formatExcludeList(this.organizer.listExcludePatterns()));
        return;
      case 'add': {
        // The rest of the line is the pattern; spaces and backslashes survive
        const pattern = unquote(line.replace(/^\s*exclude\s+add\s+/i, '').trim());
        if (!pattern || rest.length === 0) {
          this.print('Usage: exclude add <pattern>');
          return;
        }
        const added = await this.organizer.addExcludePattern(pattern);
        this.print(added ? `Added exclude pattern: ${pattern}` : `Error: Invalid regular expression pattern: ${pattern}`);
        return;
      }
      case 'remove': {
        const [position] = rest;
        if (!position) {
          this.print('Usage: exclude remove <number>');
          return;
        }
        const removed = await this.organizer.removeExcludePattern(parseOneBasedIndex(position));
        this.print(`Removed exclude pattern: ${removed}`);
        return;
      }
      default:
        this.print(`Unknown exclude action: ${action}`);
    }
  }
}
