import type { ConsoleSink } from './utils/console-logger';

import { type CliCommand, HELP_TEXT, parseCliArguments } from './core/cli-options';
import { DossierRunner } from './core/dossier-runner';
import { CliUsageError } from './errors/cli-usage-error';
import { createConsoleLogger } from './utils/console-logger';

/**
 * Run the command line and return the process exit code: 0 on success,
 * 1 on any failure.
 */
export async function runCli(
  argv: readonly string[],
  sink: ConsoleSink = console,
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArguments(argv);
  } catch (error) {
    sink.error(`${CliUsageError.getErrorMessage(error)}\n\n${HELP_TEXT}`);
    return 1;
  }

  if (command.kind === 'help') {
    sink.log(HELP_TEXT);
    return 0;
  }

  const { options } = command;
  const logger = createConsoleLogger(options.verbose ? 'debug' : 'info', sink);

  logger.info('Starting PDF processing...');
  logger.info(`Source folder: ${options.source}`);
  logger.info(`Watermark text: ${options.watermark}`);
  logger.info(`Document title: ${options.title}`);

  try {
    const result = await new DossierRunner(logger).run({
      sourceFolder: options.source,
      watermarkText: options.watermark,
      opacity: options.opacity,
      title: options.title,
      language: options.lang,
      tocPageCountPolicy: options.tocPages,
      keepIntermediates: options.keepIntermediates,
    });

    if (result.success) {
      logger.info('Processing completed successfully!');
      return 0;
    }
    logger.error('Processing failed!');
    return 1;
  } catch (error) {
    logger.error(`Processing failed: ${CliUsageError.getErrorMessage(error)}`);
    return 1;
  }
}
