import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { config } from "@/shared/config/environment";
import { logger } from "@/shared/config/logger";
import { ApiResponse, AppError, IValidationError, ValidationError } from "@/shared/types/common.types";
import { formatZodErrors } from "./validation.middleware";

export const errorHandler = (error: Error, req: Request, res: Response, next: NextFunction): void => {
  // If response was already sent, delegate to default Express error handler
  if (res.headersSent) {
    return next(error);
  }

  let statusCode = 500;
  let code = "INTERNAL_ERROR";
  let message = "Internal server error";
  let errors: IValidationError[] = [];

  if (error instanceof AppError) {
    statusCode = error.statusCode;
    code = error.code;
    message = error.message;

    if (error instanceof ValidationError) {
      errors = [
        {
          field: error.field ?? "validation",
          message: error.message,
          code: error.code,
        },
      ];
    }
  } else if (error instanceof ZodError) {
    statusCode = 400;
    code = "VALIDATION_ERROR";
    message = "Request validation failed";
    errors = formatZodErrors(error);
  } else {
    // Log unexpected errors
    logger.error(
      {
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
        request: {
          method: req.method,
          url: req.originalUrl,
          body: config.app.isDevelopment ? req.body : "[REDACTED]",
          ip: req.ip,
          userAgent: req.get("User-Agent"),
          correlationId: req.correlationId,
          userId: req.user?.id,
        },
      },
      "Unexpected error"
    );

    // Don't expose internal error details outside development
    message = config.app.isDevelopment ? error.message : "Internal server error";
  }

  const errorResponse: ApiResponse = {
    success: false,
    message,
    code,
    errors: errors.length > 0 ? errors : undefined,
  };

  res.status(statusCode).json(errorResponse);
};

export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
  const error = new AppError(`Route ${req.method} ${req.originalUrl} not found`, 404, "ROUTE_NOT_FOUND");
  next(error);
};
