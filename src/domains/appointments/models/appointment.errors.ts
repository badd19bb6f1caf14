import { ConflictError, UnprocessableEntityError } from "@/shared/types/common.types";
import type { AppointmentStatus } from "./appointment.model";

export class InvalidStateTransitionError extends UnprocessableEntityError {
  constructor(
    public readonly currentStatus: AppointmentStatus,
    public readonly operation: string,
    public readonly allowedFrom: readonly AppointmentStatus[],
    detail?: string
  ) {
    super(
      detail ??
        `Cannot ${operation} an appointment in status ${currentStatus} (allowed from: ${allowedFrom.join(", ") || "none"})`,
      "INVALID_STATE_TRANSITION"
    );
    this.name = "InvalidStateTransitionError";
  }
}

/** The requested interval overlaps another live appointment of the same doctor. */
export class SlotConflictError extends ConflictError {
  constructor(
    public readonly doctorId: string,
    public readonly conflictingIds: string[]
  ) {
    super("Time slot is already booked", "TIME_SLOT_OCCUPIED");
    this.name = "SlotConflictError";
  }
}

/** The appointment changed since it was read. */
export class VersionMismatchError extends ConflictError {
  constructor(
    public readonly appointmentId: string,
    public readonly expectedVersion: number
  ) {
    super("Appointment was modified concurrently", "VERSION_MISMATCH");
    this.name = "VersionMismatchError";
  }
}
