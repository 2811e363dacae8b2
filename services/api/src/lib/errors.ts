export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

// Something the input was expected to contain is missing, e.g. the
// "Name: " line of a report. It is the caller's input that is wrong.
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class DocumentNotFoundError extends AppError {
  readonly index: string;
  readonly documentId: string;

  constructor(index: string, documentId: string) {
    super(`Document ${documentId} not found in ${index}.`, 404);
    this.index = index;
    this.documentId = documentId;
  }
}

export class StoreError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class LlmError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
