/**
 * Librus Scraper - command line
 * Logs in with LIBRUS_LOGIN / LIBRUS_PASSWORD, runs one command and prints JSON
 */

import { writeFile } from 'fs/promises';
import { Argument, Command, InvalidArgumentError, Option } from 'commander';
import { env, requireCredentials } from './config.js';
import { AuthenticationFailedError, ConfigError } from './errors.js';
import { LibrusClient, type Transport } from './httpAuth.js';
import { LOG_LEVEL_NAMES, logger, parseLogLevel } from './logger.js';
import { AbsenceScraper } from './scrapers/absences.js';
import { GradeScraper } from './scrapers/grades.js';
import { DEFAULT_FOLDER, InboxScraper } from './scrapers/inbox.js';

export const COMMANDS = [
  'absences',
  'absence',
  'inbox',
  'message',
  'grades',
  'announcements',
  'receivers',
  'attachment',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CliOptions {
  log: string;
  folder: number;
  messageId?: number;
  absenceId?: number;
  group?: string;
  path?: string;
  out?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

/**
 * Option a command cannot run without, or null when all are present
 */
export function missingOption(command: CommandName, options: CliOptions): string | null {
  switch (command) {
    case 'message':
      return options.messageId === undefined ? '--message-id' : null;
    case 'absence':
      return options.absenceId === undefined ? '--absence-id' : null;
    case 'receivers':
      return options.group === undefined ? '--group' : null;
    case 'attachment':
      if (options.path === undefined) return '--path';
      return options.out === undefined ? '--out' : null;
    default:
      return null;
  }
}

function required<T>(value: T | undefined, flag: string, command: CommandName): T {
  if (value === undefined) {
    throw new ConfigError(`${flag} is required for the ${command} command`);
  }
  return value;
}

/**
 * Run one command against an authorized transport and return what to print
 */
export async function runCommand(command: CommandName, options: CliOptions, transport: Transport): Promise<unknown> {
  switch (command) {
    case 'absences':
      return new AbsenceScraper(transport).getAbsences();
    case 'absence':
      return new AbsenceScraper(transport).getAbsence(required(options.absenceId, '--absence-id', command));
    case 'grades':
      return new GradeScraper(transport).getGrades();
    case 'inbox':
      return new InboxScraper(transport).listInbox(options.folder);
    case 'message':
      return new InboxScraper(transport).getMessage(
        options.folder,
        required(options.messageId, '--message-id', command),
      );
    case 'announcements':
      return new InboxScraper(transport).listAnnouncements();
    case 'receivers':
      return new InboxScraper(transport).listReceivers(required(options.group, '--group', command));
    case 'attachment': {
      const path = required(options.path, '--path', command);
      const out = required(options.out, '--out', command);
      const file = await new InboxScraper(transport).getAttachment(path);
      await writeFile(out, file);
      return { path, out, bytes: file.length };
    }
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('librus')
    .description('Librus Synergia scraper: absences, grades, inbox and announcements')
    .version('1.0.0')
    .addArgument(new Argument('<command>', 'Operation to perform').choices(COMMANDS))
    .addOption(
      new Option('--log <level>', 'Set the logging level')
        .choices(LOG_LEVEL_NAMES)
        .default(env.logLevel.toUpperCase()),
    )
    .option('--message-id <id>', 'Message ID for the message command', parsePositiveInt)
    .option('--absence-id <id>', 'Absence ID for the absence command', parsePositiveInt)
    .option('--folder <id>', 'Inbox folder ID', parsePositiveInt, DEFAULT_FOLDER)
    .option('--group <name>', 'Recipient group for the receivers command')
    .option('--path <path>', 'Attachment path for the attachment command')
    .option('--out <file>', 'Output file for the attachment command')
    .action(async (command: CommandName, options: CliOptions) => {
      process.exitCode = await execute(command, options);
    });

  return program;
}

/**
 * Authorize, run, print. Resolves to the process exit code.
 */
export async function execute(command: CommandName, options: CliOptions): Promise<number> {
  try {
    logger.setLevel(parseLogLevel(options.log));

    const missing = missingOption(command, options);
    if (missing) {
      throw new ConfigError(`${missing} is required for the ${command} command`);
    }

    const { login, password } = requireCredentials();
    const client = new LibrusClient();
    const cookies = await client.authorize(login, password);
    if (!cookies || Object.keys(cookies).length === 0) {
      throw new AuthenticationFailedError();
    }
    logger.info('CLI', 'Authorization successful');

    const result = await runCommand(command, options, client);
    logger.info('CLI', `${command} executed successfully`);
    console.log(JSON.stringify(result, null, 2));
    return 0;
  } catch (err) {
    logger.exception('CLI', `Failed to execute ${command}:`, err);
    return 1;
  }
}
