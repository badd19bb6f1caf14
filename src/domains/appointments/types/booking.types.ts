import type { ConsultationType } from "@/domains/doctors/models/doctor.model";
import type { AppointmentEntity, AppointmentStatus, CancellationReason, PaymentMethod } from "../models/appointment.model";

export enum BookingError {
  SUCCESS = "SUCCESS",
  DOCTOR_NOT_FOUND = "DOCTOR_NOT_FOUND",
  USER_NOT_FOUND = "USER_NOT_FOUND",
  CLINIC_NOT_FOUND = "CLINIC_NOT_FOUND",
  APPOINTMENT_NOT_FOUND = "APPOINTMENT_NOT_FOUND",
  DOCTOR_NOT_AVAILABLE = "DOCTOR_NOT_AVAILABLE",
  TIME_SLOT_OCCUPIED = "TIME_SLOT_OCCUPIED",
  INVALID_TIME_SLOT = "INVALID_TIME_SLOT",
  BOOKING_CONFLICT = "BOOKING_CONFLICT",
  PAYMENT_FAILED = "PAYMENT_FAILED",
  REFUND_FAILED = "REFUND_FAILED",
  UNAUTHORIZED_ACCESS = "UNAUTHORIZED_ACCESS",
  CANNOT_CANCEL = "CANNOT_CANCEL",
  CANNOT_RESCHEDULE = "CANNOT_RESCHEDULE",
  INVALID_STATE = "INVALID_STATE",
  CLINIC_CLOSED = "CLINIC_CLOSED",
  DOCTOR_NOT_VERIFIED = "DOCTOR_NOT_VERIFIED",
  EMERGENCY_BOOKING_FAILED = "EMERGENCY_BOOKING_FAILED",
  FOLLOW_UP_NOT_ALLOWED = "FOLLOW_UP_NOT_ALLOWED",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  DATABASE_ERROR = "DATABASE_ERROR",
}

const STATUS_BY_ERROR: Record<BookingError, number> = {
  [BookingError.SUCCESS]: 200,
  [BookingError.DOCTOR_NOT_FOUND]: 404,
  [BookingError.USER_NOT_FOUND]: 404,
  [BookingError.CLINIC_NOT_FOUND]: 404,
  [BookingError.APPOINTMENT_NOT_FOUND]: 404,
  [BookingError.TIME_SLOT_OCCUPIED]: 409,
  [BookingError.BOOKING_CONFLICT]: 409,
  [BookingError.DOCTOR_NOT_AVAILABLE]: 422,
  [BookingError.INVALID_TIME_SLOT]: 422,
  [BookingError.CANNOT_CANCEL]: 422,
  [BookingError.CANNOT_RESCHEDULE]: 422,
  [BookingError.INVALID_STATE]: 422,
  [BookingError.CLINIC_CLOSED]: 422,
  [BookingError.DOCTOR_NOT_VERIFIED]: 422,
  [BookingError.EMERGENCY_BOOKING_FAILED]: 422,
  [BookingError.FOLLOW_UP_NOT_ALLOWED]: 422,
  [BookingError.UNAUTHORIZED_ACCESS]: 403,
  [BookingError.VALIDATION_ERROR]: 400,
  [BookingError.PAYMENT_FAILED]: 502,
  [BookingError.REFUND_FAILED]: 502,
  [BookingError.DATABASE_ERROR]: 500,
};

export const bookingErrorStatus = (error: BookingError): number => STATUS_BY_ERROR[error];

export interface BookingResult {
  error: BookingError;
  message: string;
  appointment?: AppointmentEntity;
  paymentUrl?: string;
}

export type OperationResult<T> =
  | { error: BookingError.SUCCESS; message: string; data: T }
  | { error: Exclude<BookingError, BookingError.SUCCESS>; message: string };

export interface BookingRequest {
  userId: string;
  doctorId: string;
  clinicId?: string | null;
  type: ConsultationType;
  preferredStartTime: Date;
  notes?: string | null;
}

export interface EmergencyBookingRequest {
  userId: string;
  city: string;
  type: ConsultationType;
  preferredStartTime?: Date;
  clinicId?: string | null;
  notes?: string | null;
}

export interface FollowUpRequest {
  parentAppointmentId: string;
  preferredStartTime: Date;
  notes?: string | null;
}

export interface RescheduleRequest {
  appointmentId: string;
  newStartTime: Date;
}

export interface CancellationRequest {
  appointmentId: string;
  reason: CancellationReason;
  description?: string | null;
}

export interface PaymentConfirmation {
  orderId: string;
  paymentId: string;
  signature: string;
  method: PaymentMethod;
}

export interface AvailabilitySlot {
  start: Date;
  end: Date;
  fee: number;
  doctorId: string;
  clinicId: string | null;
}

export interface AvailabilityQuery {
  doctorId: string;
  startDate: Date;
  endDate: Date;
  type: ConsultationType;
  clinicId?: string | null;
}

export interface QueueInfo {
  position: number;
  estimatedWaitMinutes: number;
}

export interface BookingStats {
  doctorId: string;
  since: Date;
  total: number;
  byStatus: Record<AppointmentStatus, number>;
  cancellationRate: number;
  averagePaidAmount: number;
}
