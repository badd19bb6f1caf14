import type { RowDataPacket } from "mysql2/promise";
import type { QueryExecutor } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import type { CacheStore } from "@/shared/types/cache.types";
import { CACHE_KEYS, CACHE_TTL } from "@/shared/types/common.types";
import {
  ConsultationType,
  DoctorEntity,
  DoctorProps,
  DoctorStatus,
  WeeklyAvailability,
  doctorSchema,
} from "../models/doctor.model";
import { AvailabilityRepository } from "./availability.repository";

const moduleLogger = createModuleLogger("DoctorRepository");

export interface DoctorStore {
  findById(id: string): Promise<DoctorEntity | null>;
  /** Verified, booking-accepting doctors flagged for emergencies in the city. */
  findEmergencyCandidates(city: string, type: ConsultationType): Promise<DoctorEntity[]>;
}

interface DoctorRow extends RowDataPacket {
  id: string;
  name: string;
  specialization: string;
  status: DoctorStatus;
  consultation_fee: number;
  consultation_duration_minutes: number;
  consultation_types: string;
  is_accepting_appointments: number;
  emergency_available: number;
  city: string;
}

const CONSULTATION_TYPES: readonly string[] = Object.values(ConsultationType);

const isConsultationType = (value: string): value is ConsultationType => CONSULTATION_TYPES.includes(value);

// SET columns come back as a comma separated string
const parseConsultationTypes = (value: string): ConsultationType[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(isConsultationType);

const rowToProps = (row: DoctorRow, availability: WeeklyAvailability[]): DoctorProps => ({
  id: row.id,
  name: row.name,
  specialization: row.specialization,
  status: row.status,
  consultationFee: Number(row.consultation_fee),
  consultationDurationMinutes: row.consultation_duration_minutes,
  consultationTypes: parseConsultationTypes(row.consultation_types),
  isAcceptingAppointments: Boolean(row.is_accepting_appointments),
  emergencyAvailable: Boolean(row.emergency_available),
  city: row.city,
  // A doctor practises at every clinic their weekly hours mention
  clinicIds: [...new Set(availability.flatMap((window) => (window.clinicId ? [window.clinicId] : [])))],
  availability,
});

export class DoctorRepository implements DoctorStore {
  constructor(
    private readonly db: QueryExecutor,
    private readonly cache: CacheStore,
    private readonly availability: AvailabilityRepository
  ) {}

  async findById(id: string): Promise<DoctorEntity | null> {
    try {
      // Try cache first
      const cacheKey = CACHE_KEYS.DOCTOR(id);
      const cached = await this.cache.getJson(cacheKey, doctorSchema);
      if (cached) {
        return DoctorEntity.create(cached);
      }

      const row = await this.db.queryOne<DoctorRow>("SELECT * FROM doctors WHERE id = ?", [id]);
      if (!row) {
        return null;
      }

      const props = rowToProps(row, await this.availability.findWeeklyByDoctor(id));
      await this.cache.setJson(cacheKey, props, CACHE_TTL.DOCTOR);

      return DoctorEntity.create(props);
    } catch (error) {
      moduleLogger.error({ error, doctorId: id }, "Error finding doctor by ID");
      throw error;
    }
  }

  async findEmergencyCandidates(city: string, type: ConsultationType): Promise<DoctorEntity[]> {
    try {
      const rows = await this.db.query<DoctorRow>(
        `SELECT * FROM doctors
         WHERE city = ?
           AND status = ?
           AND is_accepting_appointments = true
           AND emergency_available = true
           AND FIND_IN_SET(?, consultation_types) > 0
         ORDER BY name ASC`,
        [city, DoctorStatus.VERIFIED, type]
      );

      const availability = await this.availability.findWeeklyByDoctors(rows.map((row) => row.id));

      return rows.map((row) => DoctorEntity.create(rowToProps(row, availability.get(row.id) ?? [])));
    } catch (error) {
      moduleLogger.error({ error, city, type }, "Error finding emergency doctors");
      throw error;
    }
  }
}
