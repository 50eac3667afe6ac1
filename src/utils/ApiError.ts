export class ApiError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(statusCode: number, message: string, isOperational = true, stack = '') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    if (stack) {
      this.stack = stack;
    } else {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  static badRequest(message = 'Bad request'): ApiError {
    return new ApiError(400, message);
  }

  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(401, message);
  }

  static forbidden(message = 'Forbidden'): ApiError {
    return new ApiError(403, message);
  }

  static notFound(message = 'Resource not found'): ApiError {
    return new ApiError(404, message);
  }
}

/** No roster file could be found for the section, under any of its names. */
export class UnresolvedSectionError extends ApiError {
  readonly section: string;

  constructor(section: string) {
    super(404, `No student roster available for section ${section}. Upload one to continue.`);
    this.section = section;
  }
}

export class MalformedRosterError extends ApiError {
  readonly missingColumns: string[];

  constructor(section: string, missingColumns: string[]) {
    super(
      422,
      `Roster for ${section} is missing column(s): ${missingColumns.join(', ')}. ` +
        'Required: Regd. No., Name (optional: Father Name, Parent Ph.-1).'
    );
    this.missingColumns = missingColumns;
  }
}

export class InvalidDateWindowError extends ApiError {
  constructor(message: string) {
    super(400, message);
  }
}

export class StorageUnavailableError extends ApiError {
  constructor(operation: string, cause?: string) {
    super(503, `Attendance storage unavailable while trying to ${operation}${cause ? `: ${cause}` : ''}`, false);
  }
}
