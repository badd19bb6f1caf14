import { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError, ZodTypeAny } from "zod";
import { ApiResponse, IValidationError } from "@/shared/types/common.types";
import { createModuleLogger } from "@/shared/config/logger";

const moduleLogger = createModuleLogger("ValidationMiddleware");

type RequestPart = "body" | "query" | "params";

const PART_LABELS: Record<RequestPart, string> = {
  body: "Request",
  query: "Query",
  params: "Parameter",
};

export const formatZodErrors = (error: ZodError): IValidationError[] => {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "unknown",
    message: issue.message || "Invalid input",
    code: issue.code,
  }));
};

const validate = (part: RequestPart, schema: ZodTypeAny): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req[part]);

    if (!result.success) {
      const validationErrors = formatZodErrors(result.error);

      const response: ApiResponse = {
        success: false,
        message: `${PART_LABELS[part]} validation failed`,
        code: "VALIDATION_ERROR",
        errors: validationErrors,
      };

      moduleLogger.warn(
        {
          path: req.path,
          method: req.method,
          errors: validationErrors,
          correlationId: req.correlationId,
        },
        `${PART_LABELS[part]} validation failed`
      );

      res.status(400).json(response);
      return;
    }

    // Bodies are replaced with their parsed form so handlers see coerced values
    if (part === "body") {
      req.body = result.data;
    }

    next();
  };
};

export const validateBody = (schema: ZodTypeAny): RequestHandler => validate("body", schema);

export const validateQuery = (schema: ZodTypeAny): RequestHandler => validate("query", schema);

export const validateParams = (schema: ZodTypeAny): RequestHandler => validate("params", schema);
