import chalk from 'chalk';
import { Command, Option } from 'commander';

import {
  DATABASE_KINDS,
  createDialectRegistry,
  createLogger,
  extract,
  openConnection,
  renderSnapshot,
  resolveConnectionConfig,
  validateSelection,
  type QueryRunner,
} from '@dbatlas/core';

import {
  formatError,
  outputDirectory,
  parseCliOptions,
  renderDialectTable,
  renderSnapshotSummary,
  toConnectionInput,
  toSelectionInput,
  writeDocuments,
} from './utils';

const program = new Command();

program
  .name('dbatlas')
  .description('Document database schemas as cross-linked Markdown')
  .version('0.1.0');

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function withConnectionOptions(command: Command): Command {
  return command
    .helpOption('--help', 'Display help for command')
    .addOption(
      new Option('-t, --db-type <type>', 'Database engine').choices([...DATABASE_KINDS]).makeOptionMandatory(),
    )
    .addOption(new Option('-h, --host <host>', 'Database host').env('DB_HOST'))
    .addOption(new Option('-P, --port <port>', 'Database port').env('DB_PORT'))
    .addOption(new Option('-d, --database <name>', 'Database name (file path for sqlite)').env('DB_NAME'))
    .addOption(new Option('-u, --username <user>', 'Username').env('DB_USER'))
    .addOption(new Option('-p, --password <password>', 'Password').env('DB_PASSWORD'))
    .addOption(
      new Option('-c, --connection-string <url>', 'Connection string or URL').env('DB_CONNECTION_STRING'),
    )
    .option('--trusted', 'Use Windows authentication (mssql)', false)
    .option('--service-name <name>', 'Oracle service name')
    .option('--sid <sid>', 'Oracle SID')
    .option('-v, --verbose', 'Increase log verbosity (repeatable)', increaseVerbosity, 0);
}

async function withRunner<T>(runner: QueryRunner, use: (runner: QueryRunner) => Promise<T>): Promise<T> {
  try {
    return await use(runner);
  } finally {
    await runner.close();
  }
}

withConnectionOptions(program.command('scrape'))
  .description('Extract the schema and write Markdown documentation')
  .option('-o, --output <dir>', 'Output directory (database name is appended)', './schema_docs')
  .option('--schemas <list>', 'Comma-separated schemas to include')
  .option('--exclude-schemas <list>', 'Comma-separated schemas to exclude')
  .option('--object-types <list>', 'Comma-separated object types (tables,views,...,all)')
  .option('--dry-run', 'List the documents without writing them', false)
  .action(async (rawOptions: unknown) => {
    await runWithErrors(async () => {
      const options = parseCliOptions(rawOptions);
      const logger = createLogger({ verbosity: options.verbose });
      const config = resolveConnectionConfig(toConnectionInput(options));
      const selection = toSelectionInput(options);
      validateSelection(config.dialect, selection);

      const dialects = createDialectRegistry();
      const runner = await openConnection(config);
      const snapshot = await withRunner(runner, (open) =>
        extract({ runner: open, database: config.database, selection }, { dialects, logger }),
      );
      const documents = renderSnapshot(snapshot);
      const directory = outputDirectory(options.output, config.database);

      if (options.dryRun) {
        process.stdout.write(`${chalk.cyan('Dry run:')} ${documents.length} documents for ${directory}\n`);
        documents.forEach((document) => process.stdout.write(`  ${document.path}\n`));
        return;
      }

      const written = writeDocuments(directory, documents);
      process.stdout.write(renderSnapshotSummary(snapshot, directory, written.length) + '\n');
    });
  });

withConnectionOptions(program.command('test-connection'))
  .description('Connect and print the server version')
  .action(async (rawOptions: unknown) => {
    await runWithErrors(async () => {
      const options = parseCliOptions(rawOptions);
      const config = resolveConnectionConfig(toConnectionInput(options));
      const adapter = createDialectRegistry().get(config.dialect);
      const runner = await openConnection(config);
      const version = await withRunner(runner, async (open) => (adapter ? adapter.version(open) : null));
      process.stdout.write(`${chalk.green('Connected:')} ${version ?? 'unknown version'}\n`);
    });
  });

program
  .command('dialects')
  .description('List supported engines, default ports and capabilities')
  .action(() => {
    process.stdout.write(renderDialectTable(createDialectRegistry()) + '\n');
  });

program.parseAsync().catch((error: unknown) => {
  process.stderr.write(chalk.red(formatError(error)) + '\n');
  process.exit(1);
});

async function runWithErrors(fn: () => Promise<void>) {
  try {
    await fn();
  } catch (error) {
    process.stderr.write(chalk.red(formatError(error)) + '\n');
    process.exitCode = 1;
  }
}
