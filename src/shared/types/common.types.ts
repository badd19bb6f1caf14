// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T | undefined;
  message?: string | undefined;
  code?: string | undefined;
  errors?: IValidationError[] | undefined;
}

export interface IValidationError {
  field: string;
  message: string;
  code?: string;
}

// User roles enum
export enum UserRole {
  ADMIN = "admin",
  DOCTOR = "doctor",
  PATIENT = "patient",
}

// Time slot types
export interface TimeSlot {
  start: string; // HH:mm format
  end: string; // HH:mm format
}

export interface DateTimeSlot {
  start: Date;
  end: Date;
}

export enum DayOfWeek {
  SUNDAY = 0,
  MONDAY = 1,
  TUESDAY = 2,
  WEDNESDAY = 3,
  THURSDAY = 4,
  FRIDAY = 5,
  SATURDAY = 6,
}

// Cache key patterns
export const CACHE_KEYS = {
  APPOINTMENT: (id: string) => `appointment:${id}`,
  DOCTOR: (id: string) => `doctor:${id}`,
  CLINIC: (id: string) => `clinic:${id}`,
  TOKEN_BLACKLIST: (jti: string) => `blacklist:${jti}`,
  RATE_LIMIT: (key: string) => `rate_limit:${key}`,
} as const;

// Seconds
export const CACHE_TTL = {
  APPOINTMENT: 300,
  DOCTOR: 900,
  CLINIC: 3600,
} as const;

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

export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 400, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.field = field;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = "Unauthorized") {
    super(message, 401, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = "Forbidden") {
    super(message, 403, "FORBIDDEN");
    this.name = "ForbiddenError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string = "Resource conflict", code: string = "CONFLICT") {
    super(message, 409, code);
    this.name = "ConflictError";
  }
}

export class UnprocessableEntityError extends AppError {
  constructor(message: string, code: string = "UNPROCESSABLE_ENTITY") {
    super(message, 422, code);
    this.name = "UnprocessableEntityError";
  }
}
