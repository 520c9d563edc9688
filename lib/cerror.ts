export class CError extends Error {
  name = 'CError';
  constructor(msg?: string | null) {
    super(msg || 'cmdschema error');
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A raw string could not be converted to its declared type */
export class ConversionError extends CError {
  name = 'ConversionError';
}

/** A required/must-exist constraint failed */
export class ValidationError extends CError {
  name = 'ValidationError';
}

/** Any terminal failure of a parse call */
export class ParseError extends CError {
  name = 'ParseError';
}
