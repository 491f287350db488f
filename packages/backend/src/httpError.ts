export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }

  toJSON(): Record<string, unknown> {
    return { message: this.message };
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class ParsingError extends HttpError {
  constructor(source: string, details?: string) {
    super(422, details ? `Failed to parse ${source}: ${details}` : `Failed to parse ${source}`);
  }
}

export class WorldNotNewerError extends HttpError {
  uploadNetTime: number;
  existingNetTime: number;

  constructor(uploadNetTime: number, existingNetTime: number) {
    super(
      400,
      `Uploaded save is not newer than the stored world (upload netTime ${uploadNetTime}, stored netTime ${existingNetTime})`
    );
    this.uploadNetTime = uploadNetTime;
    this.existingNetTime = existingNetTime;
  }

  toJSON(): Record<string, unknown> {
    return {
      message: this.message,
      uploadNetTime: this.uploadNetTime,
      existingNetTime: this.existingNetTime
    };
  }
}

export class StoreError extends HttpError {
  operation: string;

  constructor(operation: string, cause: unknown) {
    super(500, `Store operation failed: ${operation}`);
    this.operation = operation;
    this.cause = cause;
  }

  toJSON(): Record<string, unknown> {
    return { message: 'Internal Server Error' };
  }
}

export class RequestAbortedError extends HttpError {
  constructor() {
    super(499, 'Request aborted by client');
  }
}
