//fatal import errors surface to the user verbatim; per-line problems never reach this far

export type Bc3ImportErrorCode = 'MISSING_INPUT' | 'DECODING_FAILED' | 'NO_VALID_DATA';

export class Bc3ImportError extends Error {
  readonly code: Bc3ImportErrorCode;

  constructor(code: Bc3ImportErrorCode, message: string) {
    super(message);
    this.name = 'Bc3ImportError';
    this.code = code;
  }
}

export class MissingInputError extends Bc3ImportError {
  constructor(message = 'Please, upload a BC3 file.') {
    super('MISSING_INPUT', message);
    this.name = 'MissingInputError';
  }
}

export class DecodingError extends Bc3ImportError {
  readonly attempts: readonly string[];

  constructor(attempts: readonly string[]) {
    super('DECODING_FAILED', 'The file encoding could not be determined. Please save it as UTF-8 or Windows-1252 (ANSI).');
    this.name = 'DecodingError';
    this.attempts = attempts;
  }
}

export class NoValidDataError extends Bc3ImportError {
  constructor() {
    super('NO_VALID_DATA', 'No valid concepts were found in the BC3 file to import.');
    this.name = 'NoValidDataError';
  }
}

//raised by price parsing and caught by the extractor, which skips the line
export class LinePriceError extends Error {
  readonly priceText: string;

  constructor(priceText: string) {
    super(`Invalid price "${priceText}"`);
    this.name = 'LinePriceError';
    this.priceText = priceText;
  }
}
