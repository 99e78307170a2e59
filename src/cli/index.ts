import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { createLogger, parseLogLevel, type LogLevel } from '../pipeline/log';
import { positiveOrUndefined, runInteractive, stitchRecording } from './run';
import { showLogs } from './logs';

function consoleLevel(quiet: boolean, debug: boolean): LogLevel {
  if (debug) return 'debug';
  if (quiet) return 'warn';
  return parseLogLevel(ENV.logLevel) ?? 'info';
}

async function main() {
  const parser = yargs(hideBin(process.argv));
  const cli = parser
    .scriptName('recording-stitcher')
    .command(
      'run [url]',
      'Download a recording\'s segments and stitch them into one file',
      (y) =>
        y
          .positional('url', { type: 'string', describe: 'Recording page or manifest URL' })
          .option('session-id', { type: 'string', describe: 'Session token for private recordings (browser cookie)' })
          .option('output-dir', { type: 'string', default: ENV.outputDir })
          .option('max-duration', { type: 'number', describe: 'Cut the result to this many seconds' })
          .option('keep-files', { type: 'boolean', default: false, describe: 'Keep segment files after stitching' })
          .option('concurrency', { type: 'number', default: ENV.fetchConcurrency })
          .option('interactive', { alias: 'i', type: 'boolean', default: false })
          .option('quiet', { alias: 'q', type: 'boolean', default: false })
          .option('debug', { alias: 'd', type: 'boolean', default: false }),
      async (argv) => {
        const logger = createLogger({
          level: consoleLevel(argv.quiet, argv.debug),
          format: ENV.logFormat,
          progressIntervalMs: ENV.progressIntervalMs,
        });
        const controller = new AbortController();
        const interrupt = () => {
          if (controller.signal.aborted) process.exit(1);
          console.log('\nInterrupted, cancelling...');
          controller.abort();
        };
        process.on('SIGINT', interrupt);
        const deps = { logger, signal: controller.signal };

        try {
          if (argv.interactive || (!argv.url && !argv.quiet)) {
            await runInteractive(deps, interrupt);
            return;
          }
          if (!argv.url) {
            parser.showHelp();
            console.log('\nTip: run with --interactive for guided mode');
            process.exitCode = 1;
            return;
          }
          const ok = await stitchRecording(
            {
              url: argv.url,
              sessionId: argv['session-id'],
              outputDir: argv['output-dir'],
              maxDuration: positiveOrUndefined(argv['max-duration']),
              keepFiles: argv['keep-files'],
              quiet: argv.quiet,
              debug: argv.debug,
              concurrency: argv.concurrency,
            },
            deps
          );
          if (!argv.quiet) console.log(ok ? '\nCompleted successfully.' : '\nCompleted with errors.');
          process.exitCode = ok ? 0 : 1;
        } finally {
          process.off('SIGINT', interrupt);
          logger.close();
        }
      }
    )
    .command(
      'logs',
      'Print the newest run log of a session',
      (y) =>
        y
          .option('session', { type: 'string', describe: 'Session directory name' })
          .option('file', { type: 'string', describe: 'Explicit log file path' })
          .option('output-dir', { type: 'string', default: ENV.outputDir })
          .option('level', { type: 'string', describe: 'Min level filter (debug|info|warn|error)' })
          .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' }),
      async (argv) => {
        const ok = await showLogs({
          session: argv.session,
          file: argv.file,
          outputDir: argv['output-dir'],
          level: argv.level,
          follow: argv.follow,
        });
        if (!ok) process.exitCode = 1;
      }
    )
    .demandCommand(1)
    .strict()
    .help();

  await cli.parseAsync();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
