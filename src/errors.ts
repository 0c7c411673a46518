export type KBErrorCode =
  | 'UNSUPPORTED_MODALITY'
  | 'EXTRACTION_FAILED'
  | 'NOT_FOUND'
  | 'SYNTHESIS_UNAVAILABLE'
  | 'INVALID_RECORD';

export class KBError extends Error {
  readonly code: KBErrorCode;

  constructor(code: KBErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedModalityError extends KBError {
  readonly input: string;

  constructor(input: string) {
    super('UNSUPPORTED_MODALITY', `Unsupported input: ${input}. Expected a document, image, audio or video file, or a YouTube link.`);
    this.input = input;
  }
}

export class ExtractionError extends KBError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options);
  }
}

export class NotFoundError extends KBError {
  readonly id: string;

  constructor(id: string) {
    super('NOT_FOUND', `Source not found: ${id}`);
    this.id = id;
  }
}

export class SynthesisUnavailableError extends KBError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      'SYNTHESIS_UNAVAILABLE',
      `No answer could be produced: the answer service failed after ${attempts} attempt${attempts === 1 ? '' : 's'} (${errorMessage(cause)})`,
      { cause }
    );
    this.attempts = attempts;
  }
}

export class InvalidRecordError extends KBError {
  constructor(message: string) {
    super('INVALID_RECORD', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
