import type { ResultSetHeader, RowDataPacket } from "mysql2/promise";
import type { QueryExecutor, SqlValue, TransactionRunner } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import type { CacheStore } from "@/shared/types/cache.types";
import { CACHE_KEYS, CACHE_TTL } from "@/shared/types/common.types";
import { ConsultationType } from "@/domains/doctors/models/doctor.model";
import {
  AppointmentEntity,
  AppointmentSnapshot,
  AppointmentStatus,
  CancellationReason,
  PaymentMethod,
  PaymentStatus,
  appointmentSnapshotSchema,
} from "../models/appointment.model";
import { SlotConflictError, VersionMismatchError } from "../models/appointment.errors";

const moduleLogger = createModuleLogger("AppointmentRepository");

export interface AppointmentStatusCount {
  status: AppointmentStatus;
  count: number;
  paidCount: number;
  paidAmount: number;
}

/** Storage operations the booking engine relies on. */
export interface AppointmentStore {
  findById(id: string): Promise<AppointmentEntity | null>;
  /** Live (not cancelled, not deleted) appointments of the doctor overlapping [start, end). */
  findConflicting(doctorId: string, start: Date, end: Date, excludeId?: string): Promise<AppointmentEntity[]>;
  /** Conflict check and insert as one atomic unit; throws SlotConflictError. */
  insert(appointment: AppointmentEntity): Promise<void>;
  /** Conflict check (excluding itself) and versioned update as one atomic unit. */
  reschedule(appointment: AppointmentEntity, expectedVersion: number): Promise<void>;
  /** Versioned update; throws VersionMismatchError when the row changed meanwhile. */
  update(appointment: AppointmentEntity, expectedVersion: number): Promise<void>;
  findByDoctorInRange(
    doctorId: string,
    from: Date,
    to: Date,
    statuses?: readonly AppointmentStatus[]
  ): Promise<AppointmentEntity[]>;
  findByUser(userId: string, status?: AppointmentStatus): Promise<AppointmentEntity[]>;
  countByStatusForDoctor(doctorId: string, since: Date): Promise<AppointmentStatusCount[]>;
}

export interface AppointmentRow extends RowDataPacket {
  id: string;
  user_id: string;
  doctor_id: string;
  clinic_id: string | null;
  appointment_date: string;
  start_time: Date;
  end_time: Date;
  type: ConsultationType;
  status: AppointmentStatus;
  payment_id: string | null;
  order_id: string | null;
  payment_amount: number;
  payment_currency: string;
  payment_status: PaymentStatus;
  payment_method: PaymentMethod | null;
  paid_at: Date | null;
  cancellation_reason: CancellationReason | null;
  cancellation_description: string | null;
  cancelled_at: Date | null;
  cancelled_by: string | null;
  refund_amount: number;
  refund_id: string | null;
  refund_processed: number;
  meeting_id: string | null;
  meeting_link: string | null;
  call_started_at: Date | null;
  call_ended_at: Date | null;
  consultation_duration_minutes: number | null;
  consultation_notes: string | null;
  confirmation_code: string;
  notes: string | null;
  is_emergency: number;
  is_follow_up: number;
  parent_appointment_id: string | null;
  prescription_id: string | null;
  follow_up_date: Date | null;
  confirmed_at: Date | null;
  completed_at: Date | null;
  rescheduled_from: Date | null;
  reschedule_count: number;
  version: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

interface StatusCountRow extends RowDataPacket {
  status: AppointmentStatus;
  count: number;
  paid_count: number | null;
  paid_amount: number | null;
}

// Columns written on insert and update, in parameter order
const WRITABLE_COLUMNS = [
  "user_id",
  "doctor_id",
  "clinic_id",
  "appointment_date",
  "start_time",
  "end_time",
  "type",
  "status",
  "payment_id",
  "order_id",
  "payment_amount",
  "payment_currency",
  "payment_status",
  "payment_method",
  "paid_at",
  "cancellation_reason",
  "cancellation_description",
  "cancelled_at",
  "cancelled_by",
  "refund_amount",
  "refund_id",
  "refund_processed",
  "meeting_id",
  "meeting_link",
  "call_started_at",
  "call_ended_at",
  "consultation_duration_minutes",
  "consultation_notes",
  "confirmation_code",
  "notes",
  "is_emergency",
  "is_follow_up",
  "parent_appointment_id",
  "prescription_id",
  "follow_up_date",
  "confirmed_at",
  "completed_at",
  "rescheduled_from",
  "reschedule_count",
  "updated_at",
  "deleted_at",
] as const;

export const rowToSnapshot = (row: AppointmentRow): AppointmentSnapshot => ({
  id: row.id,
  userId: row.user_id,
  doctorId: row.doctor_id,
  clinicId: row.clinic_id,
  appointmentDate: row.appointment_date,
  startTime: row.start_time,
  endTime: row.end_time,
  type: row.type,
  status: row.status,
  payment: {
    paymentId: row.payment_id,
    orderId: row.order_id,
    amount: Number(row.payment_amount),
    currency: row.payment_currency,
    status: row.payment_status,
    method: row.payment_method,
    paidAt: row.paid_at,
  },
  cancellation:
    row.cancellation_reason && row.cancelled_at && row.cancelled_by
      ? {
          reason: row.cancellation_reason,
          description: row.cancellation_description,
          cancelledAt: row.cancelled_at,
          cancelledBy: row.cancelled_by,
          refundAmount: Number(row.refund_amount),
          refundId: row.refund_id,
          refundProcessed: Boolean(row.refund_processed),
        }
      : null,
  consultation:
    row.call_started_at || row.call_ended_at || row.meeting_id || row.consultation_notes
      ? {
          meetingId: row.meeting_id,
          meetingLink: row.meeting_link,
          callStartedAt: row.call_started_at,
          callEndedAt: row.call_ended_at,
          durationMinutes: row.consultation_duration_minutes,
          notes: row.consultation_notes,
        }
      : null,
  confirmationCode: row.confirmation_code,
  notes: row.notes,
  isEmergency: Boolean(row.is_emergency),
  isFollowUp: Boolean(row.is_follow_up),
  parentAppointmentId: row.parent_appointment_id,
  prescriptionId: row.prescription_id,
  followUpDate: row.follow_up_date,
  confirmedAt: row.confirmed_at,
  completedAt: row.completed_at,
  rescheduledFrom: row.rescheduled_from,
  rescheduleCount: row.reschedule_count,
  version: row.version,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
  deletedAt: row.deleted_at,
});

export const snapshotToParams = (s: AppointmentSnapshot): SqlValue[] => [
  s.userId,
  s.doctorId,
  s.clinicId,
  s.appointmentDate,
  s.startTime,
  s.endTime,
  s.type,
  s.status,
  s.payment.paymentId,
  s.payment.orderId,
  s.payment.amount,
  s.payment.currency,
  s.payment.status,
  s.payment.method,
  s.payment.paidAt,
  s.cancellation?.reason ?? null,
  s.cancellation?.description ?? null,
  s.cancellation?.cancelledAt ?? null,
  s.cancellation?.cancelledBy ?? null,
  s.cancellation?.refundAmount ?? 0,
  s.cancellation?.refundId ?? null,
  s.cancellation?.refundProcessed ?? false,
  s.consultation?.meetingId ?? null,
  s.consultation?.meetingLink ?? null,
  s.consultation?.callStartedAt ?? null,
  s.consultation?.callEndedAt ?? null,
  s.consultation?.durationMinutes ?? null,
  s.consultation?.notes ?? null,
  s.confirmationCode,
  s.notes,
  s.isEmergency,
  s.isFollowUp,
  s.parentAppointmentId,
  s.prescriptionId,
  s.followUpDate,
  s.confirmedAt,
  s.completedAt,
  s.rescheduledFrom,
  s.rescheduleCount,
  s.updatedAt,
  s.deletedAt,
];

const CONFLICT_SQL = `SELECT * FROM appointments
  WHERE doctor_id = ?
    AND status <> 'cancelled'
    AND deleted_at IS NULL
    AND start_time < ?
    AND end_time > ?`;

export class AppointmentRepository implements AppointmentStore {
  constructor(
    private readonly db: TransactionRunner,
    private readonly cache: CacheStore
  ) {}

  async findById(id: string): Promise<AppointmentEntity | null> {
    try {
      // Try cache first
      const cacheKey = CACHE_KEYS.APPOINTMENT(id);
      const cached = await this.cache.getJson(cacheKey, appointmentSnapshotSchema);
      if (cached) {
        return AppointmentEntity.fromSnapshot(cached);
      }

      const row = await this.db.queryOne<AppointmentRow>(
        "SELECT * FROM appointments WHERE id = ? AND deleted_at IS NULL",
        [id]
      );

      if (!row) {
        return null;
      }

      const snapshot = rowToSnapshot(row);
      await this.cache.setJson(cacheKey, snapshot, CACHE_TTL.APPOINTMENT);

      return AppointmentEntity.fromSnapshot(snapshot);
    } catch (error) {
      moduleLogger.error({ error, appointmentId: id }, "Error finding appointment by ID");
      throw error;
    }
  }

  async findConflicting(doctorId: string, start: Date, end: Date, excludeId?: string): Promise<AppointmentEntity[]> {
    return this.conflictsWithin(this.db, doctorId, start, end, excludeId);
  }

  async insert(appointment: AppointmentEntity): Promise<void> {
    const snapshot = appointment.toSnapshot();

    try {
      await this.db.transaction(async (tx) => {
        await this.lockDoctor(tx, snapshot.doctorId);

        const conflicts = await this.conflictsWithin(tx, snapshot.doctorId, snapshot.startTime, snapshot.endTime);
        if (conflicts.length > 0) {
          throw new SlotConflictError(
            snapshot.doctorId,
            conflicts.map((conflict) => conflict.id)
          );
        }

        await tx.execute(
          `INSERT INTO appointments (id, ${WRITABLE_COLUMNS.join(", ")}, version, created_at)
           VALUES (?, ${WRITABLE_COLUMNS.map(() => "?").join(", ")}, ?, ?)`,
          [snapshot.id, ...snapshotToParams(snapshot), snapshot.version, snapshot.createdAt]
        );
      });

      moduleLogger.info(
        {
          appointmentId: snapshot.id,
          doctorId: snapshot.doctorId,
          userId: snapshot.userId,
          startTime: snapshot.startTime,
        },
        "Appointment created successfully"
      );
    } catch (error) {
      if (!(error instanceof SlotConflictError)) {
        moduleLogger.error({ error, appointmentId: snapshot.id }, "Error creating appointment");
      }
      throw error;
    }
  }

  async reschedule(appointment: AppointmentEntity, expectedVersion: number): Promise<void> {
    const snapshot = appointment.toSnapshot();

    try {
      await this.db.transaction(async (tx) => {
        await this.lockDoctor(tx, snapshot.doctorId);

        const conflicts = await this.conflictsWithin(
          tx,
          snapshot.doctorId,
          snapshot.startTime,
          snapshot.endTime,
          snapshot.id
        );
        if (conflicts.length > 0) {
          throw new SlotConflictError(
            snapshot.doctorId,
            conflicts.map((conflict) => conflict.id)
          );
        }

        await this.writeVersioned(tx, snapshot, expectedVersion);
      });

      appointment.markPersisted(expectedVersion + 1);
      await this.cache.del(CACHE_KEYS.APPOINTMENT(snapshot.id));
    } catch (error) {
      if (!(error instanceof SlotConflictError) && !(error instanceof VersionMismatchError)) {
        moduleLogger.error({ error, appointmentId: snapshot.id }, "Error rescheduling appointment");
      }
      throw error;
    }
  }

  async update(appointment: AppointmentEntity, expectedVersion: number): Promise<void> {
    const snapshot = appointment.toSnapshot();

    try {
      await this.writeVersioned(this.db, snapshot, expectedVersion);

      appointment.markPersisted(expectedVersion + 1);
      await this.cache.del(CACHE_KEYS.APPOINTMENT(snapshot.id));
    } catch (error) {
      if (!(error instanceof VersionMismatchError)) {
        moduleLogger.error({ error, appointmentId: snapshot.id }, "Error updating appointment");
      }
      throw error;
    }
  }

  async findByDoctorInRange(
    doctorId: string,
    from: Date,
    to: Date,
    statuses?: readonly AppointmentStatus[]
  ): Promise<AppointmentEntity[]> {
    try {
      let query = `SELECT * FROM appointments
        WHERE doctor_id = ? AND deleted_at IS NULL AND start_time < ? AND end_time > ?`;
      const params: SqlValue[] = [doctorId, to, from];

      if (statuses && statuses.length > 0) {
        query += ` AND status IN (${statuses.map(() => "?").join(", ")})`;
        params.push(...statuses);
      }

      query += " ORDER BY start_time ASC";

      const rows = await this.db.query<AppointmentRow>(query, params);
      return rows.map((row) => AppointmentEntity.fromSnapshot(rowToSnapshot(row)));
    } catch (error) {
      moduleLogger.error({ error, doctorId }, "Error finding appointments by doctor");
      throw error;
    }
  }

  async findByUser(userId: string, status?: AppointmentStatus): Promise<AppointmentEntity[]> {
    try {
      let query = "SELECT * FROM appointments WHERE user_id = ? AND deleted_at IS NULL";
      const params: SqlValue[] = [userId];

      if (status) {
        query += " AND status = ?";
        params.push(status);
      }

      query += " ORDER BY start_time DESC";

      const rows = await this.db.query<AppointmentRow>(query, params);
      return rows.map((row) => AppointmentEntity.fromSnapshot(rowToSnapshot(row)));
    } catch (error) {
      moduleLogger.error({ error, userId }, "Error finding appointments by user");
      throw error;
    }
  }

  async countByStatusForDoctor(doctorId: string, since: Date): Promise<AppointmentStatusCount[]> {
    try {
      const rows = await this.db.query<StatusCountRow>(
        `SELECT
          status,
          COUNT(*) AS count,
          SUM(CASE WHEN payment_status = 'paid' THEN 1 ELSE 0 END) AS paid_count,
          SUM(CASE WHEN payment_status = 'paid' THEN payment_amount ELSE 0 END) AS paid_amount
        FROM appointments
        WHERE doctor_id = ? AND start_time >= ? AND deleted_at IS NULL
        GROUP BY status`,
        [doctorId, since]
      );

      return rows.map((row) => ({
        status: row.status,
        count: Number(row.count),
        paidCount: Number(row.paid_count ?? 0),
        paidAmount: Number(row.paid_amount ?? 0),
      }));
    } catch (error) {
      moduleLogger.error({ error, doctorId }, "Error getting appointment stats");
      throw error;
    }
  }

  // Serializes bookings for one doctor until the transaction ends
  private async lockDoctor(tx: QueryExecutor, doctorId: string): Promise<void> {
    await tx.query<RowDataPacket>("SELECT id FROM doctors WHERE id = ? FOR UPDATE", [doctorId]);
  }

  private async conflictsWithin(
    executor: QueryExecutor,
    doctorId: string,
    start: Date,
    end: Date,
    excludeId?: string
  ): Promise<AppointmentEntity[]> {
    const params: SqlValue[] = [doctorId, end, start];
    let query = CONFLICT_SQL;

    if (excludeId) {
      query += " AND id <> ?";
      params.push(excludeId);
    }

    const rows = await executor.query<AppointmentRow>(query, params);
    return rows.map((row) => AppointmentEntity.fromSnapshot(rowToSnapshot(row)));
  }

  private async writeVersioned(
    executor: QueryExecutor,
    snapshot: AppointmentSnapshot,
    expectedVersion: number
  ): Promise<void> {
    const result: ResultSetHeader = await executor.execute(
      `UPDATE appointments
       SET ${WRITABLE_COLUMNS.map((column) => `${column} = ?`).join(", ")}, version = version + 1
       WHERE id = ? AND version = ?`,
      [...snapshotToParams(snapshot), snapshot.id, expectedVersion]
    );

    if (result.affectedRows === 0) {
      throw new VersionMismatchError(snapshot.id, expectedVersion);
    }
  }
}
