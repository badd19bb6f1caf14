import { Response } from "express";
import { ApiResponse, IValidationError } from "@/shared/types/common.types";

// Success response utilities
export const sendSuccess = <T = unknown>(
  res: Response,
  data?: T,
  message: string = "Success",
  statusCode: number = 200
): void => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
  };

  res.status(statusCode).json(response);
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
    ...(code && { code }),
  };

  res.status(statusCode).json(response);
};
