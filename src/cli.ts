#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import ora from 'ora';
import { loadConfig } from './config.js';
import { parseImageReference } from './core/image.js';
import { toEnvelope } from './core/handler.js';
import { createRuntime } from './function.js';
import { formatConsoleOutput } from './output/console.js';
import { formatJsonOutput } from './output/json.js';
import { logger } from './utils/logger.js';
import { ProgressTracker } from './utils/progress.js';

export function createCli(argv?: string[]) {
  const y = yargs(argv ?? hideBin(process.argv))
    .scriptName('deployment-scanner')
    .version('0.1.0')
    .command(
      'handle <file>',
      'Scan the images named in a saved deployment audit event',
      (y) =>
        y
          .positional('file', {
            type: 'string',
            demandOption: true,
            describe: 'Pub/Sub envelope or audit log entry (JSON)',
          })
          .option('event-id', {
            type: 'string',
            describe: 'Event id used for tags and logs (defaults to the message id)',
          })
          .option('output', {
            type: 'string',
            choices: ['console', 'json'],
            default: 'console',
            describe: 'Output format (console or json)',
          }),
      async (args) => {
        const startTime = Date.now();
        const envelope = toEnvelope(JSON.parse(readFileSync(String(args.file), 'utf8')));
        const eventId = args.eventId ?? envelope.messageId ?? `local-${startTime}`;

        const progress = new ProgressTracker();
        const spinner = ora('Decoding event...').start();
        progress.subscribe((event) => {
          spinner.text = event.totalImages
            ? `[${(event.imagesDone ?? 0) + 1}/${event.totalImages}] ${event.message}`
            : event.message;
        });

        try {
          const { handler, store } = createRuntime(loadConfig(), { progress });
          await store.ensureStorage();
          const report = await handler.handle(envelope, { eventId });

          if (!report) {
            spinner.info('Event ignored: not a deployment with container images');
            return;
          }
          spinner.stop();

          const scanDuration = Date.now() - startTime;
          if (args.output === 'json') {
            console.log(JSON.stringify(formatJsonOutput(report, scanDuration), null, 2));
          } else {
            formatConsoleOutput(report, scanDuration);
          }
        } catch (err) {
          spinner.fail('Scan failed');
          logger.error({ err }, 'Scan failed');
          throw err;
        }
      }
    )
    .command(
      'parse-image <image>',
      'Show how an image reference is interpreted',
      (y) => y.positional('image', { type: 'string', demandOption: true }),
      (args) => {
        console.log(JSON.stringify(parseImageReference(String(args.image)), null, 2));
      }
    )
    .demandCommand(1)
    .help()
    .strict();

  return y;
}

async function main() {
  const argv = await createCli().parseAsync();
  return argv;
}

main().catch((err: unknown) => {
  logger.error({ err }, 'CLI error');
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
