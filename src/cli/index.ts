import { stdout, stderr, exit } from 'node:process';
import { Command } from 'commander';
import { createArchiver, loadConfigFromEnv, yearToFolder, ArchiverError } from '../index.js';
import type { RunSummary, YearArchiver } from '../index.js';

// ---------------------------------------------------------------------------
// ANSI color helpers
// ---------------------------------------------------------------------------

const isColorEnabled = stdout.isTTY === true && !process.env['NO_COLOR'];

function ansi(code: string): (text: string) => string {
  if (!isColorEnabled) return (text) => text;
  return (text) => `\x1b[${code}m${text}\x1b[0m`;
}

const c = {
  bold: ansi('1'),
  dim: ansi('2'),
  red: ansi('31'),
  green: ansi('32'),
  yellow: ansi('33'),
  cyan: ansi('36'),
};

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function out(text: string): void {
  stdout.write(text + '\n');
}

function info(text: string): void {
  out(c.cyan('ℹ') + ' ' + text);
}

function success(text: string): void {
  out(c.green('✓') + ' ' + text);
}

function warn(text: string): void {
  stderr.write(c.yellow('⚠') + ' ' + text + '\n');
}

function plural(count: number, word: string, many = `${word}s`): string {
  return `${count} ${count === 1 ? word : many}`;
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    `Archived ${summary.moved} of ${plural(summary.total, 'message')} from ${summary.mailbox} ` +
      `in ${plural(summary.batches, 'batch', 'batches')}`,
  ];

  const years = [...summary.movedByYear.keys()].sort((a, b) => a - b);
  for (const year of years) {
    lines.push(`  ${yearToFolder(year)}: ${summary.movedByYear.get(year) ?? 0}`);
  }
  if (summary.foldersCreated.length > 0) {
    lines.push(`Created ${summary.foldersCreated.map(yearToFolder).join(', ')}`);
  }
  if (summary.skipped > 0) {
    lines.push(`Left ${plural(summary.skipped, 'current-year message')} in ${summary.mailbox}`);
  }
  return lines;
}

function attachReporter(archiver: YearArchiver): void {
  archiver.on('run:started', ({ mailbox, total }) => {
    info(`Found ${plural(total, 'message')} in ${c.bold(mailbox)}`);
  });
  archiver.on('batch:started', ({ index, size }) => {
    info(`Processing ${plural(size, 'message')} ${c.dim(`(batch ${index + 1})`)}`);
  });
  archiver.on('batch:classified', ({ skipped }) => {
    if (skipped > 0) info(c.dim(`Leaving ${plural(skipped, 'current-year message')} in place`));
  });
  archiver.on('folder:found', ({ folder }) => {
    info(`Caching existing folder ${c.bold(folder)}`);
  });
  archiver.on('folder:created', ({ folder }) => {
    success(`Created missing folder ${c.bold(folder)}`);
  });
  archiver.on('messages:moved', ({ folder, count }) => {
    success(`Moved ${plural(count, 'message')} to ${c.bold(folder)}`);
  });
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function cmdArchive(server: string): Promise<void> {
  const archiver = createArchiver(loadConfigFromEnv(server));
  attachReporter(archiver);

  info(`Connecting to ${c.bold(server)}...`);
  try {
    const mailbox = await archiver.connect();
    info(`Selected ${c.bold(mailbox.path)} ${c.dim(`(${plural(mailbox.exists, 'message')})`)}`);

    const summary = await archiver.run();
    out('');
    for (const line of formatSummary(summary)) out(line);
    if (summary.moved === 0) warn('Nothing to archive');
  } finally {
    await archiver.disconnect();
  }
}

// ---------------------------------------------------------------------------
// CLI setup
// ---------------------------------------------------------------------------

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = new Command();

  program
    .name('imap-year-archiver')
    .description(
      'Move messages from previous years into Archives/<year> folders. ' +
        'Credentials are read from IMAP_USERNAME and IMAP_PASSWORD.',
    )
    .version('0.1.0')
    .argument('<server>', 'IMAP server address')
    .action(wrapAction(cmdArchive));

  await program.parseAsync(argv);
}

function wrapAction<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      if (err instanceof ArchiverError) {
        stderr.write(c.red('Error') + ' ' + c.dim(`[${err.code}]`) + ' ' + err.message + '\n');
        if (err.cause instanceof Error) {
          stderr.write(c.dim(`  caused by: ${err.cause.message}`) + '\n');
        }
      } else if (err instanceof Error) {
        stderr.write(c.red('Error') + ' ' + err.message + '\n');
      } else {
        stderr.write(c.red('Error') + ' ' + String(err) + '\n');
      }
      exit(1);
    }
  };
}
