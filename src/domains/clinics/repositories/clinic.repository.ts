import type { RowDataPacket } from "mysql2/promise";
import type { QueryExecutor } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import type { CacheStore } from "@/shared/types/cache.types";
import { CACHE_KEYS, CACHE_TTL, DayOfWeek } from "@/shared/types/common.types";
import { ClinicEntity, ClinicProps, ClinicStatus, clinicSchema } from "../models/clinic.model";

const moduleLogger = createModuleLogger("ClinicRepository");

export interface ClinicStore {
  findById(id: string): Promise<ClinicEntity | null>;
}

interface ClinicRow extends RowDataPacket {
  id: string;
  name: string;
  city: string;
  timezone: string;
  status: ClinicStatus;
}

interface WorkingHoursRow extends RowDataPacket {
  day_of_week: DayOfWeek;
  start_time: string;
  end_time: string;
  is_closed: number;
  break_start: string | null;
  break_end: string | null;
}

const toTimeString = (value: string): string => value.slice(0, 5);

export class ClinicRepository implements ClinicStore {
  constructor(
    private readonly db: QueryExecutor,
    private readonly cache: CacheStore
  ) {}

  async findById(id: string): Promise<ClinicEntity | null> {
    try {
      const cacheKey = CACHE_KEYS.CLINIC(id);
      const cached = await this.cache.getJson(cacheKey, clinicSchema);
      if (cached) {
        return ClinicEntity.create(cached);
      }

      const row = await this.db.queryOne<ClinicRow>("SELECT id, name, city, timezone, status FROM clinics WHERE id = ?", [
        id,
      ]);
      if (!row) {
        return null;
      }

      const hours = await this.db.query<WorkingHoursRow>(
        `SELECT day_of_week, start_time, end_time, is_closed, break_start, break_end
         FROM clinic_working_hours
         WHERE clinic_id = ?
         ORDER BY day_of_week ASC`,
        [id]
      );

      const props: ClinicProps = {
        id: row.id,
        name: row.name,
        city: row.city,
        timezone: row.timezone,
        status: row.status,
        workingHours: hours.map((entry) => ({
          dayOfWeek: entry.day_of_week,
          startTime: toTimeString(entry.start_time),
          endTime: toTimeString(entry.end_time),
          isClosed: Boolean(entry.is_closed),
          breakStart: entry.break_start ? toTimeString(entry.break_start) : null,
          breakEnd: entry.break_end ? toTimeString(entry.break_end) : null,
        })),
      };

      await this.cache.setJson(cacheKey, props, CACHE_TTL.CLINIC);

      return ClinicEntity.create(props);
    } catch (error) {
      moduleLogger.error({ error, clinicId: id }, "Error finding clinic by ID");
      throw error;
    }
  }
}
