// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T | undefined;
  message?: string | undefined;
  code?: string | undefined;
  errors?: IValidationError[] | undefined;
  meta?: PaginationMeta | undefined;
  debug?: Record<string, string | undefined> | undefined;
}

export interface IValidationError {
  field: string;
  message: string;
  code?: string;
}

export interface PaginationMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
  hasNextPage: boolean;
  hasPreviousPage: boolean;
}

// Outcome of a business operation that can fail for a rule reason rather than an exception
export type OperationErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "REFERENCE_NOT_FOUND"
  | "CONFLICT"
  | "INVALID_STATE"
  | "UPSTREAM_ERROR"
  | "OPERATION_FAILED";

export type OperationResult<T> =
  | { success: true; message: string; data: T }
  | { success: false; message: string; code: OperationErrorCode };

export const succeed = <T>(message: string, data: T): OperationResult<T> => ({ success: true, message, data });

export const fail = <T = never>(code: OperationErrorCode, message: string): OperationResult<T> => ({
  success: false,
  message,
  code,
});

// Error types
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = "INTERNAL_ERROR",
    isOperational: boolean = true
  ) {
    super(message);

    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = "Resource not found") {
    super(message, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string = "Resource conflict") {
    super(message, 409, "CONFLICT");
    this.name = "ConflictError";
  }
}

