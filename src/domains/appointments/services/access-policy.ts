import type { Actor } from "@/shared/types/auth.types";
import { UserRole } from "@/shared/types/common.types";

export interface AppointmentParticipants {
  userId: string;
  doctorId: string;
}

/** Admins see everything; patients their own bookings; doctors the bookings made with them. */
export const canAccessAppointment = (actor: Actor, appointment: AppointmentParticipants): boolean => {
  switch (actor.role) {
    case UserRole.ADMIN:
      return true;
    case UserRole.PATIENT:
      return actor.id === appointment.userId;
    case UserRole.DOCTOR:
      return actor.id === appointment.doctorId;
    default:
      return false;
  }
};

/** Clinical transitions (start, complete, no-show) belong to the treating doctor or an admin. */
export const canManageConsultation = (actor: Actor, appointment: AppointmentParticipants): boolean => {
  return actor.role === UserRole.ADMIN || (actor.role === UserRole.DOCTOR && actor.id === appointment.doctorId);
};

/** Bookings and booking history: the patient themselves or an admin. */
export const canActForPatient = (actor: Actor, userId: string): boolean => {
  return actor.role === UserRole.ADMIN || actor.id === userId;
};

/** A doctor's schedule and statistics: that doctor or an admin. */
export const canViewDoctorSchedule = (actor: Actor, doctorId: string): boolean => {
  return actor.role === UserRole.ADMIN || (actor.role === UserRole.DOCTOR && actor.id === doctorId);
};
