import { createModuleLogger } from "@/shared/config/logger";
import type { AppointmentEntity } from "../models/appointment.model";
import type { AppointmentStore } from "../repositories/appointment.repository";

const moduleLogger = createModuleLogger("ConflictCheckerService");

export interface ConflictCheckRequest {
  doctorId: string;
  start: Date;
  end: Date;
  excludeAppointmentId?: string;
}

export interface ConflictDetails {
  conflictingAppointmentId: string;
  conflictingStartTime: Date;
  conflictingEndTime: Date;
}

/**
 * Read-side overlap check used before attempting a write. The write itself
 * repeats the check under a doctor lock, so this only avoids pointless writes.
 */
export class ConflictCheckerService {
  constructor(private readonly appointments: AppointmentStore) {}

  async findConflicts(request: ConflictCheckRequest): Promise<ConflictDetails[]> {
    const existing = await this.appointments.findConflicting(
      request.doctorId,
      request.start,
      request.end,
      request.excludeAppointmentId
    );

    const conflicts = existing
      .filter((appointment: AppointmentEntity) => appointment.overlaps(request.start, request.end))
      .map((appointment) => ({
        conflictingAppointmentId: appointment.id,
        conflictingStartTime: appointment.startTime,
        conflictingEndTime: appointment.endTime,
      }));

    if (conflicts.length > 0) {
      moduleLogger.debug(
        {
          doctorId: request.doctorId,
          start: request.start,
          end: request.end,
          conflicts: conflicts.map((conflict) => conflict.conflictingAppointmentId),
        },
        "Time slot conflict detected"
      );
    }

    return conflicts;
  }

  async isSlotFree(request: ConflictCheckRequest): Promise<boolean> {
    const conflicts = await this.findConflicts(request);
    return conflicts.length === 0;
  }
}
