import type { RowDataPacket } from "mysql2/promise";
import type { QueryExecutor } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import { DayOfWeek } from "@/shared/types/common.types";
import { ConsultationType, WeeklyAvailability } from "../models/doctor.model";

const moduleLogger = createModuleLogger("AvailabilityRepository");

interface AvailabilityRow extends RowDataPacket {
  doctor_id: string;
  day_of_week: DayOfWeek;
  start_time: string;
  end_time: string;
  clinic_id: string | null;
  consultation_type: ConsultationType | null;
}

// TIME columns come back as HH:mm:ss
const toTimeString = (value: string): string => value.slice(0, 5);

const rowToWindow = (row: AvailabilityRow): WeeklyAvailability => ({
  dayOfWeek: row.day_of_week,
  startTime: toTimeString(row.start_time),
  endTime: toTimeString(row.end_time),
  clinicId: row.clinic_id,
  consultationType: row.consultation_type,
});

export class AvailabilityRepository {
  constructor(private readonly db: QueryExecutor) {}

  async findWeeklyByDoctor(doctorId: string): Promise<WeeklyAvailability[]> {
    try {
      const rows = await this.db.query<AvailabilityRow>(
        `SELECT doctor_id, day_of_week, start_time, end_time, clinic_id, consultation_type
         FROM doctor_availability
         WHERE doctor_id = ? AND is_active = true
         ORDER BY day_of_week ASC, start_time ASC`,
        [doctorId]
      );

      return rows.map(rowToWindow);
    } catch (error) {
      moduleLogger.error({ error, doctorId }, "Error loading doctor availability");
      throw error;
    }
  }

  async findWeeklyByDoctors(doctorIds: string[]): Promise<Map<string, WeeklyAvailability[]>> {
    const byDoctor = new Map<string, WeeklyAvailability[]>();
    if (doctorIds.length === 0) {
      return byDoctor;
    }

    try {
      const rows = await this.db.query<AvailabilityRow>(
        `SELECT doctor_id, day_of_week, start_time, end_time, clinic_id, consultation_type
         FROM doctor_availability
         WHERE doctor_id IN (${doctorIds.map(() => "?").join(", ")}) AND is_active = true
         ORDER BY day_of_week ASC, start_time ASC`,
        doctorIds
      );

      for (const row of rows) {
        const windows = byDoctor.get(row.doctor_id) ?? [];
        windows.push(rowToWindow(row));
        byDoctor.set(row.doctor_id, windows);
      }

      return byDoctor;
    } catch (error) {
      moduleLogger.error({ error, doctorIds }, "Error loading availability for doctors");
      throw error;
    }
  }
}
