export {
  BatchReporter,
  type BatchItemOutcome,
  type BatchReport,
} from './utils/batch-report';
export { formatZodIssues } from './utils/format-zod-issues';
export {
  err,
  ok,
  tryAsync,
  type Failure,
  type Result,
  type Success,
} from './utils/result';
export {
  WATERMARKED_SUFFIX,
  formatWatermarkedFileName,
} from './utils/watermarked-file-name';
export { REPLACEMENT_CHARACTER, toWinAnsi } from './utils/win-ansi';
