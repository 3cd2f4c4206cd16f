// =============================================================================
// COURSEWORK — Validation Pipeline Services
// =============================================================================

export { validate, validateOrThrow, echoInput } from './validate';
export * from './forms';
export {
  REQUIRED_MESSAGE,
  INVALID_FORMAT_MESSAGE,
  combineDateTime,
  isUploadedFile,
  parseCalendarDate,
  parseClockTime,
  parseDateTime,
} from './fields';
