export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "not found") {
    super(message, 404);
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(fileName: string) {
    super(`unsupported file type: ${fileName}`, 415);
  }
}

export class ExtractionError extends AppError {
  readonly fileName: string;

  constructor(fileName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`could not extract text from ${fileName}: ${reason}`, 422, { cause });
    this.fileName = fileName;
  }
}
