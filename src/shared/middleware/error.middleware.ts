import type { Request, Response, NextFunction } from "express";
import { config } from "@/shared/config/environment";
import { logError } from "@/shared/config/logger";
import { ZodError } from "zod";
import { ApiResponse, AppError, IValidationError } from "@/shared/types/common.types";
import { formatZodErrors } from "./validation.middleware";

// body-parser marks malformed JSON with type "entity.parse.failed"
const isBodyParseError = (error: Error): boolean =>
  "type" in error && error.type === "entity.parse.failed";

export const errorHandler = (error: Error, req: Request, res: Response, next: NextFunction): void => {
  // If response was already sent, delegate to default Express error handler
  if (res.headersSent) {
    next(error);
    return;
  }

  let statusCode = 500;
  let code = "INTERNAL_ERROR";
  let message = "Internal server error";
  let errors: IValidationError[] = [];

  if (error instanceof AppError) {
    statusCode = error.statusCode;
    code = error.code;
    message = error.message;
  } else if (error instanceof ZodError) {
    statusCode = 400;
    code = "VALIDATION_ERROR";
    message = "Validation failed";
    errors = formatZodErrors(error);
  } else if (isBodyParseError(error)) {
    statusCode = 400;
    code = "INVALID_JSON";
    message = "Request body is not valid JSON";
  } else {
    // Log unexpected errors
    logError(error, {
      method: req.method,
      url: req.originalUrl,
      body: config.app.isDevelopment ? req.body : "[REDACTED]",
      ip: req.ip,
      userAgent: req.get("User-Agent"),
      correlationId: req.correlationId,
    });

    // Don't expose internal error details in production
    if (!config.app.isProduction) {
      message = error.message;
    }
  }

  const errorResponse: ApiResponse = {
    success: false,
    message,
    code,
    ...(errors.length > 0 && { errors }),
    ...(config.app.isDevelopment && {
      debug: {
        stack: error.stack,
        correlationId: req.correlationId,
      },
    }),
  };

  res.status(statusCode).json(errorResponse);
};

export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
  next(new AppError(`Route ${req.method} ${req.originalUrl} not found`, 404, "ROUTE_NOT_FOUND"));
};
