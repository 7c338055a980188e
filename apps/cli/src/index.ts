export { runCli } from './cli';
export {
  HELP_TEXT,
  parseCliArguments,
  type CliCommand,
  type CliOptions,
} from './core/cli-options';
export {
  DossierRunner,
  formatOutputFileName,
  type DossierRunOptions,
  type DossierRunResult,
  type WatermarkReport,
} from './core/dossier-runner';
export {
  isPdfFileName,
  walkSourceFolder,
  type WalkSourceFolderOptions,
} from './core/folder-walker';
export { CliUsageError } from './errors/cli-usage-error';
export { DossierWriteError } from './errors/dossier-write-error';
export { SourceFolderError } from './errors/source-folder-error';
export {
  createConsoleLogger,
  formatLogLine,
  formatTimestamp,
  type ConsoleSink,
} from './utils/console-logger';
export { writeFileAtomic } from './utils/write-file-atomic';
