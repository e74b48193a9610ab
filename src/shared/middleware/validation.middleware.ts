import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError } from "zod";
import type { ApiResponse, IValidationError } from "@/shared/types/common.types";
import { createModuleLogger } from "@/shared/config/logger";

const moduleLogger = createModuleLogger("ValidationMiddleware");

export const formatZodErrors = (error: ZodError): IValidationError[] => {
  return error.errors.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "unknown",
    message: issue.message || "Invalid input",
    code: issue.code,
  }));
};

type RequestSource = "body" | "query" | "params";

const SOURCE_LABELS: Record<RequestSource, string> = {
  body: "Request",
  query: "Query",
  params: "Parameter",
};

const validate = (source: RequestSource, schema: z.ZodTypeAny): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated: unknown = await schema.parseAsync(req[source]);

      // Query and params keep their raw string form; controllers parse them with the same schema
      if (source === "body") {
        req.body = validated;
      }

      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const validationErrors = formatZodErrors(error);

        const response: ApiResponse = {
          success: false,
          message: `${SOURCE_LABELS[source]} validation failed`,
          errors: validationErrors,
        };

        moduleLogger.warn(
          {
            path: req.path,
            method: req.method,
            errors: validationErrors,
            correlationId: req.correlationId,
          },
          `${SOURCE_LABELS[source]} validation failed`
        );

        res.status(400).json(response);
        return;
      }
      next(error);
    }
  };
};

export const validateBody = (schema: z.ZodTypeAny): RequestHandler => validate("body", schema);

export const validateQuery = (schema: z.ZodTypeAny): RequestHandler => validate("query", schema);

export const validateParams = (schema: z.ZodTypeAny): RequestHandler => validate("params", schema);
