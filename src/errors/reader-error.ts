/**
 * glyph-reader typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export class GlyphReaderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GlyphReaderError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A required input was absent or structurally invalid. */
export class InvalidArgumentError extends GlyphReaderError {
  constructor(message: string, context?: Record<string, unknown>, code = 'INVALID_ARGUMENT') {
    super(message, code, context);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The image decoder could not turn the source into a pixel grid. */
export class UnreadableImageError extends InvalidArgumentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, 'UNREADABLE_IMAGE');
    this.name = 'UnreadableImageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised by the Recognizer when a language pack is missing or malformed. */
export class InvalidLanguageError extends GlyphReaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_LANGUAGE', context);
    this.name = 'InvalidLanguageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LanguagePackNotFoundError extends GlyphReaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LANGUAGE_PACK_NOT_FOUND', context);
    this.name = 'LanguagePackNotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedTemplateRecordError extends GlyphReaderError {
  constructor(
    message: string,
    public readonly line: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'MALFORMED_TEMPLATE_RECORD', { line, ...context });
    this.name = 'MalformedTemplateRecordError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends GlyphReaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
