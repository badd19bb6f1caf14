import { z } from "zod";
import { ConsultationType } from "../models/doctor.model";

// UUID validation schema
const uuidSchema = z.string().uuid("Invalid UUID format");

const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format");

const MAX_AVAILABILITY_RANGE_DAYS = 31;
const DAY_MS = 24 * 60 * 60 * 1000;

export const doctorIdParamSchema = z.object({
  id: uuidSchema,
});

// Inclusive calendar-day range
export const availabilityQuerySchema = z
  .object({
    startDate: dateSchema,
    endDate: dateSchema,
    type: z.nativeEnum(ConsultationType).default(ConsultationType.ONLINE),
    clinicId: uuidSchema.optional(),
  })
  .refine((query) => query.startDate <= query.endDate, {
    message: "End date must not be before start date",
    path: ["endDate"],
  })
  .refine(
    (query) => Date.parse(query.endDate) - Date.parse(query.startDate) < MAX_AVAILABILITY_RANGE_DAYS * DAY_MS,
    {
      message: `Date range cannot exceed ${MAX_AVAILABILITY_RANGE_DAYS} days`,
      path: ["endDate"],
    }
  );

export const nextAvailableQuerySchema = z.object({
  count: z.coerce.number().int().min(1, "Count must be at least 1").max(20, "Count cannot exceed 20").default(5),
  type: z.nativeEnum(ConsultationType).default(ConsultationType.ONLINE),
  clinicId: uuidSchema.optional(),
});

export const bookingStatsQuerySchema = z.object({
  days: z.coerce.number().int().min(1, "Days must be at least 1").max(365, "Days cannot exceed 365").default(30),
});
