import jwt from "jsonwebtoken";
import type { Actor } from "@/shared/types/auth.types";
import { DayOfWeek, UserRole } from "@/shared/types/common.types";
import { AppointmentEntity, NewAppointment } from "@/domains/appointments/models/appointment.model";
import { DEFAULT_BOOKING_POLICY } from "@/domains/appointments/models/booking-policy";
import { ClinicEntity, ClinicProps, ClinicStatus, WorkingHours } from "@/domains/clinics/models/clinic.model";
import {
  ConsultationType,
  DoctorEntity,
  DoctorProps,
  DoctorStatus,
  WeeklyAvailability,
} from "@/domains/doctors/models/doctor.model";

export const TEST_JWT_SECRET = "test-secret-test-secret-test-secret";

export const DOCTOR_ID = "doctor-1";
export const PATIENT_ID = "patient-1";
export const CLINIC_ID = "clinic-1";

const ALL_DAYS = [
  DayOfWeek.SUNDAY,
  DayOfWeek.MONDAY,
  DayOfWeek.TUESDAY,
  DayOfWeek.WEDNESDAY,
  DayOfWeek.THURSDAY,
  DayOfWeek.FRIDAY,
  DayOfWeek.SATURDAY,
];

export const everyDay = (startTime: string, endTime: string): WeeklyAvailability[] =>
  ALL_DAYS.map((dayOfWeek) => ({ dayOfWeek, startTime, endTime, clinicId: null, consultationType: null }));

export const buildDoctor = (overrides: Partial<DoctorProps> = {}): DoctorEntity =>
  DoctorEntity.create({
    id: DOCTOR_ID,
    name: "Dr. Test",
    specialization: "General Medicine",
    status: DoctorStatus.VERIFIED,
    consultationFee: 500,
    consultationDurationMinutes: 30,
    consultationTypes: [ConsultationType.ONLINE, ConsultationType.OFFLINE],
    isAcceptingAppointments: true,
    emergencyAvailable: false,
    city: "Pune",
    clinicIds: [],
    availability: everyDay("09:00", "17:00"),
    ...overrides,
  });

export const openEveryDay = (
  startTime: string,
  endTime: string,
  breakStart: string | null = null,
  breakEnd: string | null = null
): WorkingHours[] =>
  ALL_DAYS.map((dayOfWeek) => ({ dayOfWeek, startTime, endTime, isClosed: false, breakStart, breakEnd }));

export const buildClinic = (overrides: Partial<ClinicProps> = {}): ClinicEntity =>
  ClinicEntity.create({
    id: CLINIC_ID,
    name: "Test Clinic",
    city: "Pune",
    timezone: "UTC",
    status: ClinicStatus.ACTIVE,
    workingHours: openEveryDay("09:00", "18:00", "13:00", "14:00"),
    ...overrides,
  });

export const buildAppointment = (
  overrides: Partial<NewAppointment> & Pick<NewAppointment, "startTime">,
  now: Date
): AppointmentEntity => {
  const startTime = overrides.startTime;

  return AppointmentEntity.create(
    {
      id: "appointment-1",
      userId: PATIENT_ID,
      doctorId: DOCTOR_ID,
      clinicId: null,
      type: ConsultationType.ONLINE,
      endTime: new Date(startTime.getTime() + 30 * 60_000),
      fee: 500,
      confirmationCode: "APT123456",
      ...overrides,
    },
    DEFAULT_BOOKING_POLICY,
    now
  );
};

export const patient = (id: string = PATIENT_ID): Actor => ({ id, role: UserRole.PATIENT });
export const doctorActor = (id: string = DOCTOR_ID): Actor => ({ id, role: UserRole.DOCTOR });
export const admin = (id: string = "admin-1"): Actor => ({ id, role: UserRole.ADMIN });

export const signToken = (actor: Actor, options: jwt.SignOptions = {}, secret: string = TEST_JWT_SECRET): string =>
  jwt.sign({ id: actor.id, role: actor.role }, secret, { algorithm: "HS256", expiresIn: "15m", ...options });
