/**
 * Errors
 *
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  GlyphReaderError,
  InvalidArgumentError,
  UnreadableImageError,
  InvalidLanguageError,
  LanguagePackNotFoundError,
  MalformedTemplateRecordError,
  ConfigurationError,
} from './reader-error.js';

export { ErrorHandler } from './error-handler.js';
export type { WrapResult } from './error-handler.js';
