import { WATERMARK_DEFAULTS } from '@dossier/pdf-watermark';
import { formatZodIssues } from '@dossier/shared';
import { parseArgs } from 'node:util';
import { z } from 'zod';

import { CLI_DEFAULTS } from '../config/constants';
import { CliUsageError } from '../errors/cli-usage-error';

export const HELP_TEXT = `Usage: dossier -s <folder> [options]

Watermark PDFs and combine them into a single document

Options:
  -s, --source <folder>     Source folder containing subfolders with PDF files
  -w, --watermark <text>    Watermark text to apply to PDFs (default: '${WATERMARK_DEFAULTS.TEXT}')
  -t, --title <text>        Title for the document (default: '${CLI_DEFAULTS.TITLE}')
  -o, --opacity <number>    Watermark opacity between 0 and 1 (default: ${WATERMARK_DEFAULTS.OPACITY})
      --lang <en|fr>        Language of the title page, TOC and bookmarks (default: ${CLI_DEFAULTS.LANGUAGE})
      --toc-pages <mode>    exact | estimate: how the TOC length is known before numbering (default: ${CLI_DEFAULTS.TOC_PAGES})
      --keep-intermediates  Keep the watermarked files in temp_watermarked
      --verbose             Log debug messages
  -h, --help                Show this help

Examples:
  dossier -s ./Docs
  dossier -s ./Docs -w "RESERVE POUR LOCATION APPARTEMENT"
  dossier -s ./Docs -t "Dossier Famille Dupont"`;

const cliOptionsSchema = z.object({
  source: z
    .string({ required_error: 'Missing required option --source' })
    .min(1, 'Source folder must not be empty'),
  watermark: z
    .string()
    .trim()
    .min(1, 'Watermark text must not be empty')
    .default(WATERMARK_DEFAULTS.TEXT),
  title: z
    .string()
    .trim()
    .min(1, 'Title must not be empty')
    .default(CLI_DEFAULTS.TITLE),
  opacity: z.coerce
    .number({ invalid_type_error: 'Opacity must be a number' })
    .min(0, 'Opacity must be between 0 and 1')
    .max(1, 'Opacity must be between 0 and 1')
    .default(WATERMARK_DEFAULTS.OPACITY),
  lang: z.enum(['en', 'fr']).default(CLI_DEFAULTS.LANGUAGE),
  tocPages: z.enum(['exact', 'estimate']).default(CLI_DEFAULTS.TOC_PAGES),
  keepIntermediates: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; options: CliOptions };

/**
 * Parse and validate the command line (without the node and script
 * arguments).
 *
 * @throws CliUsageError for arguments that do not parse or validate
 */
export function parseCliArguments(argv: readonly string[]): CliCommand {
  const values = readArgs(argv);

  if (values.help === true) {
    return { kind: 'help' };
  }

  const parsed = cliOptionsSchema.safeParse({
    source: values.source,
    watermark: values.watermark,
    title: values.title,
    opacity: values.opacity,
    lang: values.lang,
    tocPages: values['toc-pages'],
    keepIntermediates: values['keep-intermediates'],
    verbose: values.verbose,
  });
  if (!parsed.success) {
    throw new CliUsageError(
      `Invalid arguments: ${formatZodIssues(parsed.error)}`,
    );
  }
  return { kind: 'run', options: parsed.data };
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        source: { type: 'string', short: 's' },
        watermark: { type: 'string', short: 'w' },
        title: { type: 'string', short: 't' },
        opacity: { type: 'string', short: 'o' },
        lang: { type: 'string' },
        'toc-pages': { type: 'string' },
        'keep-intermediates': { type: 'boolean' },
        verbose: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw CliUsageError.fromError('Invalid arguments', error);
  }
}
