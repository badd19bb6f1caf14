import { z } from "zod";
import { ConsultationType } from "@/domains/doctors/models/doctor.model";
import { AppointmentStatus, CancellationReason, PaymentMethod } from "../models/appointment.model";

// UUID validation schema
const uuidSchema = z.string().uuid("Invalid UUID format");

// ISO 8601 instant with an explicit offset, e.g. 2025-03-01T10:00:00Z
export const instantSchema = z
  .string()
  .datetime({ offset: true, message: "Must be an ISO 8601 date-time with a time zone" })
  .transform((value) => new Date(value));

const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format");

const notesSchema = z.string().trim().max(500, "Notes cannot exceed 500 characters");

export const appointmentIdParamSchema = z.object({
  id: uuidSchema,
});

export const bookAppointmentSchema = z.object({
  doctorId: uuidSchema,
  // Admins and doctors book on behalf of a patient
  userId: uuidSchema.optional(),
  clinicId: uuidSchema.nullable().optional(),
  type: z.nativeEnum(ConsultationType),
  preferredStartTime: instantSchema,
  notes: notesSchema.optional(),
});

export const emergencyBookingSchema = z.object({
  userId: uuidSchema.optional(),
  city: z.string().trim().min(1, "City is required").max(100, "City cannot exceed 100 characters"),
  type: z.nativeEnum(ConsultationType),
  preferredStartTime: instantSchema.optional(),
  clinicId: uuidSchema.nullable().optional(),
  notes: notesSchema.optional(),
});

export const followUpSchema = z.object({
  preferredStartTime: instantSchema,
  notes: notesSchema.optional(),
});

export const rescheduleAppointmentSchema = z.object({
  newStartTime: instantSchema,
});

export const cancelAppointmentSchema = z.object({
  reason: z.nativeEnum(CancellationReason),
  description: z.string().trim().max(1000, "Description cannot exceed 1000 characters").optional(),
});

export const completeAppointmentSchema = z.object({
  notes: z.string().trim().max(2000, "Notes cannot exceed 2000 characters").optional(),
});

export const recordPaymentSchema = z.object({
  orderId: z.string().min(1, "Order ID is required"),
  paymentId: z.string().min(1, "Payment ID is required"),
  signature: z.string().regex(/^[a-f0-9]{64}$/i, "Signature must be a hex encoded SHA-256 HMAC"),
  method: z.nativeEnum(PaymentMethod).default(PaymentMethod.GATEWAY),
});

// Patients list their own bookings; doctors and admins list a doctor's day
export const listAppointmentsQuerySchema = z.object({
  status: z.nativeEnum(AppointmentStatus).optional(),
  userId: uuidSchema.optional(),
  doctorId: uuidSchema.optional(),
  date: dateSchema.optional(),
});

export type BookAppointmentBody = z.infer<typeof bookAppointmentSchema>;
export type EmergencyBookingBody = z.infer<typeof emergencyBookingSchema>;
export type FollowUpBody = z.infer<typeof followUpSchema>;
export type RescheduleAppointmentBody = z.infer<typeof rescheduleAppointmentSchema>;
export type CancelAppointmentBody = z.infer<typeof cancelAppointmentSchema>;
export type CompleteAppointmentBody = z.infer<typeof completeAppointmentSchema>;
export type RecordPaymentBody = z.infer<typeof recordPaymentSchema>;
