#!/usr/bin/env node

import { SignaturitService, ConfigurationError, ListingError, HTTP_STATUS, parseExistingPolicy } from './index';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import ora from 'ora';
import chalk from 'chalk';
import path from 'path';
import 'dotenv/config';

const argv = yargs(hideBin(process.argv))
  .usage('Usage: $0 [options]')
  .options({
    year: {
      alias: 'y',
      describe: 'Year whose completed signatures are downloaded',
      default: new Date().getFullYear(),
      type: 'number',
    },
    output: {
      alias: 'o',
      describe: 'Output root (a <year> folder is created inside it)',
      type: 'string',
    },
    sandbox: {
      describe: 'Use the sandbox API instead of production',
      default: false,
      type: 'boolean',
    },
    pageSize: {
      describe: 'Signatures requested per listing page (max 100)',
      default: 100,
      type: 'number',
    },
    maxAttempts: {
      describe: 'Attempts per request when the API answers 429 or 5xx',
      default: 5,
      type: 'number',
    },
    retryDelay: {
      describe: 'Initial retry delay in milliseconds, doubled on every retry',
      default: 1500,
      type: 'number',
    },
    timeout: {
      describe: 'Per-request timeout in milliseconds',
      default: 60000,
      type: 'number',
    },
    onExisting: {
      describe: 'What to do when the target file already exists',
      choices: ['skip', 'rename'],
      default: 'skip',
      type: 'string',
    },
  })
  .check(argv => {
    if (!Number.isInteger(argv.year)) {
      throw new Error('Year must be an integer, e.g. 2024');
    }
    if (argv.pageSize < 1 || argv.pageSize > 100) {
      throw new Error('Page size must be between 1 and 100');
    }
    return true;
  })
  .example('$0', 'Download every signed document of the current year')
  .example('$0 -y 2023', 'Download documents signed in 2023')
  .example('$0 -y 2023 -o ./archive --on-existing rename', 'Keep existing files and save new copies next to them')
  .example('$0 --sandbox', 'Run against the sandbox API')
  .parseSync();

let spinner: ora.Ora;

async function main() {
  spinner = ora('Initializing Signaturit exporter...').start();

  const service = new SignaturitService({
    environment: argv.sandbox ? 'sandbox' : undefined,
    outputRoot: argv.output,
    year: argv.year,
    pageLimit: argv.pageSize,
    maxAttempts: argv.maxAttempts,
    retryDelay: argv.retryDelay,
    timeout: argv.timeout,
    onExisting: parseExistingPolicy(argv.onExisting),
  });

  service.on('runStarted', ({ year, since, until, baseUrl, maskedToken }) => {
    spinner.info(`Year: ${chalk.bold(year)} | Range: ${since} → ${until}`);
    console.log(`Using token: ${maskedToken} | Base URL: ${baseUrl}`);
    spinner = ora('Fetching signatures...').start();
  });

  service.on('pageFetched', ({ total }) => {
    spinner.text = `Fetching signatures... ${chalk.green(total)} so far`;
  });

  service.on('signaturesListed', ({ year, total }) => {
    spinner.succeed(`Found ${chalk.green(total)} signature request(s) in ${year}`);
    spinner = ora('Downloading documents...').start();
  });

  service.on('retrying', ({ attempt, delay, status, path: requestPath }) => {
    spinner.warn(`HTTP ${status} on ${requestPath}, retry ${attempt} in ${delay}ms`);
    spinner.start();
  });

  service.on('detailFailed', ({ signatureId, error }) => {
    spinner.warn(`Could not fetch detail for ${chalk.yellow(signatureId)}: ${error}`);
    spinner.start();
  });

  service.on('noEmailFound', ({ signatureId, samplePath }) => {
    const hint = samplePath ? `, payload saved to ${chalk.blue(samplePath)}` : '';
    spinner.info(`No signer email found for ${chalk.yellow(signatureId)}${hint}`);
    spinner.start();
  });

  service.on('documentDownloaded', ({ file }) => {
    spinner.succeed(`${chalk.green('✓')} ${path.basename(file.path)}`);
    spinner.start();
  });

  service.on('documentSkipped', ({ row }) => {
    spinner.text = `Skipped ${path.basename(row.savedPath)} (already exists)`;
  });

  service.on('documentFailed', ({ row }) => {
    spinner.warn(`${chalk.red('✗')} Failed ${row.signatureId}/${row.documentId}: ${row.error}`);
    spinner.start();
  });

  const report = await service.run(argv.year);
  const { downloaded, skipped, failed } = report.summary;

  if (report.totalSignatures === 0) {
    spinner.info(`No completed signatures found between ${report.since} and ${report.until}`);
  } else if (failed > 0) {
    spinner.warn(`Completed with ${chalk.yellow(failed)} failed download(s)`);
  } else {
    spinner.succeed('Done.');
  }

  console.log(
    `Downloaded: ${chalk.green(downloaded)} | Skipped (already existed): ${chalk.blue(skipped)} | Failed: ${chalk.red(failed)}`
  );
  console.log(`Log saved to: ${chalk.blue(report.ledgerPath)}`);
}

main().catch((err: unknown) => {
  if (spinner) spinner.fail('Error running Signaturit exporter');
  console.error(chalk.red('\nError details:'));
  console.error(err instanceof Error ? err.message : String(err));

  if (err instanceof ConfigurationError) {
    console.log(chalk.yellow('\nSet SIGNATURIT_API_TOKEN in your environment or in a .env file.'));
  } else if (err instanceof ListingError && err.status === HTTP_STATUS.UNAUTHORIZED) {
    console.log(chalk.yellow('\nThe API rejected the token. Check that it belongs to the selected environment.'));
  }

  process.exit(1);
});
