/**
 * glyph-reader error handler
 *
 * Converts thrown values to user-friendly messages and wraps async
 * functions with structured error handling.
 */

import {
  GlyphReaderError,
  InvalidLanguageError,
  UnreadableImageError,
  ConfigurationError,
} from './reader-error.js';

export { GlyphReaderError } from './reader-error.js';

export type WrapResult<T> = { ok: true; data: T } | { ok: false; error: GlyphReaderError };

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof UnreadableImageError) {
      const source = err.context?.source;
      return typeof source === 'string'
        ? `Could not decode image: ${source}`
        : 'Could not decode image.';
    }
    if (err instanceof InvalidLanguageError) {
      const language = err.context?.language;
      return typeof language === 'string'
        ? `Language pack "${language}" is missing or malformed. Run \`glyph-reader languages\` to list installed packs.`
        : 'Language pack is missing or malformed.';
    }
    if (err instanceof ConfigurationError) {
      return `${err.message}. Run \`glyph-reader config validate\` for details.`;
    }
    if (err instanceof GlyphReaderError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws; failures come back as { ok: false, error }.
   */
  static async wrap<T>(
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<WrapResult<T>> {
    try {
      const data = await fn();
      return { ok: true, data };
    } catch (err) {
      if (err instanceof GlyphReaderError) {
        if (context && !err.context) {
          return { ok: false, error: new GlyphReaderError(err.message, err.code, context) };
        }
        return { ok: false, error: err };
      }
      // Wrap generic errors in GlyphReaderError
      const wrapped = new GlyphReaderError(
        err instanceof Error ? err.message : String(err),
        'UNKNOWN_ERROR',
        context
      );
      return { ok: false, error: wrapped };
    }
  }
}
