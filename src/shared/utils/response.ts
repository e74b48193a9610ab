import type { Response } from "express";
import type {
  ApiResponse,
  IValidationError,
  OperationErrorCode,
  OperationResult,
  PaginationMeta,
} from "@/shared/types/common.types";

// Success response utilities
export const sendSuccess = <T = unknown>(
  res: Response,
  data?: T,
  message: string = "Success",
  statusCode: number = 200,
  meta?: PaginationMeta
): void => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    ...(meta && { meta }),
  };

  res.status(statusCode).json(response);
};

export const sendCreated = <T = unknown>(
  res: Response,
  data: T,
  message: string = "Resource created successfully"
): void => {
  sendSuccess(res, data, message, 201);
};

export const sendDeleted = (res: Response, message: string = "Resource deleted successfully"): void => {
  sendSuccess(res, undefined, message, 200);
};

// Error response utilities
export const sendError = (
  res: Response,
  message: string,
  statusCode: number = 400,
  errors?: IValidationError[],
  code?: string
): void => {
  const response: ApiResponse = {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code ? { code } : {}),
  };

  res.status(statusCode).json(response);
};

export const sendNotFound = (res: Response, message: string = "Resource not found"): void => {
  sendError(res, message, 404, undefined, "NOT_FOUND");
};

// Pagination utilities
export const sendPaginatedResponse = <T = unknown>(
  res: Response,
  data: T[],
  page: number,
  limit: number,
  total: number,
  message: string = "Data retrieved successfully"
): void => {
  const totalPages = Math.ceil(total / limit);
  const hasNextPage = page < totalPages;
  const hasPreviousPage = page > 1;

  const meta: PaginationMeta = {
    page,
    limit,
    total,
    totalPages,
    hasNextPage,
    hasPreviousPage,
  };

  sendSuccess(res, data, message, 200, meta);
};

// Operation results
export const OPERATION_STATUS: Record<OperationErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  REFERENCE_NOT_FOUND: 422,
  CONFLICT: 409,
  INVALID_STATE: 422,
  UPSTREAM_ERROR: 502,
  OPERATION_FAILED: 500,
};

export const sendOperationResult = <T, U = T>(
  res: Response,
  result: OperationResult<T>,
  options: { successStatus?: number; transform?: (data: T) => U } = {}
): void => {
  if (!result.success) {
    sendError(res, result.message, OPERATION_STATUS[result.code], undefined, result.code);
    return;
  }

  const data = options.transform ? options.transform(result.data) : result.data;
  sendSuccess(res, data, result.message, options.successStatus ?? 200);
};

// Health check response
export const sendHealthCheck = <T>(res: Response, data: T, message: string = "Service is healthy"): void => {
  sendSuccess(res, data, message, 200);
};
