import { z } from "zod";
import { DateTimeSlot, DayOfWeek } from "@/shared/types/common.types";
import { createDateTimeSlot, getDayOfWeek, isValidTimeString, timeStringToMinutes } from "@/shared/utils/date";

export enum DoctorStatus {
  PENDING_VERIFICATION = "pending_verification",
  VERIFIED = "verified",
  SUSPENDED = "suspended",
  INACTIVE = "inactive",
}

export enum ConsultationType {
  ONLINE = "online",
  OFFLINE = "offline",
}

/**
 * One recurring window of the doctor's weekly pattern. A null clinic means the
 * window applies wherever the doctor consults; a null type means both kinds.
 */
export interface WeeklyAvailability {
  dayOfWeek: DayOfWeek;
  startTime: string;
  endTime: string;
  clinicId: string | null;
  consultationType: ConsultationType | null;
}

export interface DoctorProps {
  id: string;
  name: string;
  specialization: string;
  status: DoctorStatus;
  consultationFee: number;
  consultationDurationMinutes: number;
  consultationTypes: ConsultationType[];
  isAcceptingAppointments: boolean;
  emergencyAvailable: boolean;
  city: string;
  clinicIds: string[];
  availability: WeeklyAvailability[];
}

const timeString = z.string().refine(isValidTimeString, "Expected HH:mm");

export const weeklyAvailabilitySchema = z.object({
  dayOfWeek: z.nativeEnum(DayOfWeek),
  startTime: timeString,
  endTime: timeString,
  clinicId: z.string().nullable(),
  consultationType: z.nativeEnum(ConsultationType).nullable(),
});

export const doctorSchema = z.object({
  id: z.string(),
  name: z.string(),
  specialization: z.string(),
  status: z.nativeEnum(DoctorStatus),
  consultationFee: z.number().nonnegative(),
  consultationDurationMinutes: z.number().int().positive(),
  consultationTypes: z.array(z.nativeEnum(ConsultationType)),
  isAcceptingAppointments: z.boolean(),
  emergencyAvailable: z.boolean(),
  city: z.string(),
  clinicIds: z.array(z.string()),
  availability: z.array(weeklyAvailabilitySchema),
});

export class DoctorEntity {
  private constructor(private readonly props: DoctorProps) {}

  static create(props: DoctorProps): DoctorEntity {
    return new DoctorEntity({
      ...props,
      availability: props.availability.filter(
        (window) => timeStringToMinutes(window.startTime) < timeStringToMinutes(window.endTime)
      ),
    });
  }

  get id(): string {
    return this.props.id;
  }

  get name(): string {
    return this.props.name;
  }

  get status(): DoctorStatus {
    return this.props.status;
  }

  get consultationFee(): number {
    return this.props.consultationFee;
  }

  get consultationDurationMinutes(): number {
    return this.props.consultationDurationMinutes;
  }

  get city(): string {
    return this.props.city;
  }

  get emergencyAvailable(): boolean {
    return this.props.emergencyAvailable;
  }

  get isAcceptingAppointments(): boolean {
    return this.props.isAcceptingAppointments;
  }

  isVerified(): boolean {
    return this.props.status === DoctorStatus.VERIFIED;
  }

  /** Verified and taking new bookings. */
  isBookable(): boolean {
    return this.isVerified() && this.props.isAcceptingAppointments;
  }

  supportsConsultationType(type: ConsultationType): boolean {
    return this.props.consultationTypes.includes(type);
  }

  /** Doctors without clinic-specific hours are not tied to any clinic. */
  worksAtClinic(clinicId: string): boolean {
    return this.props.clinicIds.length === 0 || this.props.clinicIds.includes(clinicId);
  }

  /**
   * Weekly-pattern windows falling on the local calendar day of `day`, restricted to
   * those usable for the consultation type (and clinic, for in-person visits).
   */
  windowsOn(day: Date, timezone: string, type: ConsultationType, clinicId?: string | null): DateTimeSlot[] {
    const dayOfWeek = getDayOfWeek(day, timezone);

    return this.props.availability
      .filter((window) => window.dayOfWeek === dayOfWeek)
      .filter((window) => window.consultationType === null || window.consultationType === type)
      .filter((window) => !clinicId || window.clinicId === null || window.clinicId === clinicId)
      .map((window) => createDateTimeSlot(day, { start: window.startTime, end: window.endTime }, timezone))
      .sort((a, b) => a.start.getTime() - b.start.getTime());
  }

  /** True when [start, end) lies inside one weekly window usable for the visit. */
  isAvailableDuring(
    start: Date,
    end: Date,
    timezone: string,
    type: ConsultationType,
    clinicId?: string | null
  ): boolean {
    return this.windowsOn(start, timezone, type, clinicId).some((window) => window.start <= start && end <= window.end);
  }

  toJSON(): DoctorProps {
    return {
      ...this.props,
      consultationTypes: [...this.props.consultationTypes],
      clinicIds: [...this.props.clinicIds],
      availability: this.props.availability.map((window) => ({ ...window })),
    };
  }
}
