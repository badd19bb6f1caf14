import { z } from "zod";
import { ValidationError } from "@/shared/types/common.types";
import { addMinutes, formatDate, minutesBetween } from "@/shared/utils/date";
import { ConsultationType } from "@/domains/doctors/models/doctor.model";
import { InvalidStateTransitionError } from "./appointment.errors";
import type { BookingPolicy } from "./booking-policy";

export enum AppointmentStatus {
  PENDING = "pending",
  CONFIRMED = "confirmed",
  IN_PROGRESS = "in_progress",
  COMPLETED = "completed",
  CANCELLED = "cancelled",
  NO_SHOW = "no_show",
  RESCHEDULED = "rescheduled",
}

export enum PaymentStatus {
  PENDING = "pending",
  PAID = "paid",
  FAILED = "failed",
  REFUNDED = "refunded",
  PARTIALLY_REFUNDED = "partially_refunded",
}

export enum PaymentMethod {
  GATEWAY = "gateway",
  UPI = "upi",
  CREDIT_CARD = "credit_card",
  DEBIT_CARD = "debit_card",
  NET_BANKING = "net_banking",
  WALLET = "wallet",
}

export enum CancellationReason {
  PATIENT_REQUEST = "patient_request",
  DOCTOR_UNAVAILABLE = "doctor_unavailable",
  EMERGENCY = "emergency",
  TECHNICAL_ISSUE = "technical_issue",
  WEATHER = "weather",
  OTHER = "other",
}

export interface PaymentInfo {
  paymentId: string | null;
  orderId: string | null;
  amount: number;
  currency: string;
  status: PaymentStatus;
  method: PaymentMethod | null;
  paidAt: Date | null;
}

export interface CancellationInfo {
  reason: CancellationReason;
  description: string | null;
  cancelledAt: Date;
  cancelledBy: string;
  refundAmount: number;
  refundId: string | null;
  refundProcessed: boolean;
}

export interface ConsultationInfo {
  meetingId: string | null;
  meetingLink: string | null;
  callStartedAt: Date | null;
  callEndedAt: Date | null;
  durationMinutes: number | null;
  notes: string | null;
}

export interface AppointmentSnapshot {
  id: string;
  userId: string;
  doctorId: string;
  clinicId: string | null;
  appointmentDate: string;
  startTime: Date;
  endTime: Date;
  type: ConsultationType;
  status: AppointmentStatus;
  payment: PaymentInfo;
  cancellation: CancellationInfo | null;
  consultation: ConsultationInfo | null;
  confirmationCode: string;
  notes: string | null;
  isEmergency: boolean;
  isFollowUp: boolean;
  parentAppointmentId: string | null;
  prescriptionId: string | null;
  followUpDate: Date | null;
  confirmedAt: Date | null;
  completedAt: Date | null;
  rescheduledFrom: Date | null;
  rescheduleCount: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface NewAppointment {
  id: string;
  userId: string;
  doctorId: string;
  clinicId: string | null;
  type: ConsultationType;
  startTime: Date;
  endTime: Date;
  fee: number;
  confirmationCode: string;
  notes?: string | null;
  isEmergency?: boolean;
  parentAppointmentId?: string | null;
}

export interface PaymentCapture {
  paymentId: string;
  orderId: string;
  method: PaymentMethod;
}

export interface MeetingDetails {
  meetingId: string;
  meetingLink: string;
}

const nullableDate = z.coerce.date().nullable();

export const appointmentSnapshotSchema = z.object({
  id: z.string(),
  userId: z.string(),
  doctorId: z.string(),
  clinicId: z.string().nullable(),
  appointmentDate: z.string(),
  startTime: z.coerce.date(),
  endTime: z.coerce.date(),
  type: z.nativeEnum(ConsultationType),
  status: z.nativeEnum(AppointmentStatus),
  payment: z.object({
    paymentId: z.string().nullable(),
    orderId: z.string().nullable(),
    amount: z.number(),
    currency: z.string(),
    status: z.nativeEnum(PaymentStatus),
    method: z.nativeEnum(PaymentMethod).nullable(),
    paidAt: nullableDate,
  }),
  cancellation: z
    .object({
      reason: z.nativeEnum(CancellationReason),
      description: z.string().nullable(),
      cancelledAt: z.coerce.date(),
      cancelledBy: z.string(),
      refundAmount: z.number(),
      refundId: z.string().nullable(),
      refundProcessed: z.boolean(),
    })
    .nullable(),
  consultation: z
    .object({
      meetingId: z.string().nullable(),
      meetingLink: z.string().nullable(),
      callStartedAt: nullableDate,
      callEndedAt: nullableDate,
      durationMinutes: z.number().nullable(),
      notes: z.string().nullable(),
    })
    .nullable(),
  confirmationCode: z.string(),
  notes: z.string().nullable(),
  isEmergency: z.boolean(),
  isFollowUp: z.boolean(),
  parentAppointmentId: z.string().nullable(),
  prescriptionId: z.string().nullable(),
  followUpDate: nullableDate,
  confirmedAt: nullableDate,
  completedAt: nullableDate,
  rescheduledFrom: nullableDate,
  rescheduleCount: z.number().int(),
  version: z.number().int(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  deletedAt: nullableDate,
});

const { PENDING, CONFIRMED, IN_PROGRESS, COMPLETED, CANCELLED, NO_SHOW, RESCHEDULED } = AppointmentStatus;

// Legal source states per transition; RESCHEDULED behaves as a confirmed booking with new times
const ALLOWED_FROM = {
  confirm: [PENDING],
  startConsultation: [CONFIRMED, RESCHEDULED],
  complete: [IN_PROGRESS],
  completeOffline: [IN_PROGRESS, CONFIRMED, RESCHEDULED],
  cancel: [PENDING, CONFIRMED, RESCHEDULED, IN_PROGRESS],
  markNoShow: [PENDING, CONFIRMED, RESCHEDULED],
  reschedule: [PENDING, CONFIRMED, RESCHEDULED],
  processRefund: [CANCELLED],
  markPaid: [PENDING, CONFIRMED, RESCHEDULED, IN_PROGRESS, COMPLETED],
  attachPaymentOrder: [PENDING, CONFIRMED, RESCHEDULED],
  recordFollowUp: [COMPLETED],
} as const satisfies Record<string, readonly AppointmentStatus[]>;

type Transition = keyof typeof ALLOWED_FROM;

const NOT_CANCELLABLE: readonly AppointmentStatus[] = [COMPLETED, CANCELLED, NO_SHOW];
const NOT_RESCHEDULABLE: readonly AppointmentStatus[] = [COMPLETED, CANCELLED, NO_SHOW, IN_PROGRESS];

const roundCurrency = (amount: number): number => Math.round(amount * 100) / 100;

export class AppointmentEntity {
  private constructor(private state: AppointmentSnapshot) {}

  static create(input: NewAppointment, policy: BookingPolicy, now: Date = new Date()): AppointmentEntity {
    if (!AppointmentEntity.isValidTimeSlot(input.startTime, input.endTime, policy)) {
      throw new ValidationError(
        `Appointment must last at least ${policy.minSlotMinutes} minutes and end after it starts`,
        "endTime"
      );
    }

    return new AppointmentEntity({
      id: input.id,
      userId: input.userId,
      doctorId: input.doctorId,
      clinicId: input.clinicId,
      appointmentDate: formatDate(input.startTime, "YYYY-MM-DD", policy.timezone),
      startTime: input.startTime,
      endTime: input.endTime,
      type: input.type,
      status: PENDING,
      payment: {
        paymentId: null,
        orderId: null,
        amount: input.fee,
        currency: policy.currency,
        status: PaymentStatus.PENDING,
        method: null,
        paidAt: null,
      },
      cancellation: null,
      consultation: null,
      confirmationCode: input.confirmationCode,
      notes: input.notes ?? null,
      isEmergency: input.isEmergency ?? false,
      isFollowUp: Boolean(input.parentAppointmentId),
      parentAppointmentId: input.parentAppointmentId ?? null,
      prescriptionId: null,
      followUpDate: null,
      confirmedAt: null,
      completedAt: null,
      rescheduledFrom: null,
      rescheduleCount: 0,
      version: 1,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    });
  }

  static fromSnapshot(snapshot: AppointmentSnapshot): AppointmentEntity {
    return new AppointmentEntity(AppointmentEntity.copy(snapshot));
  }

  static isValidTimeSlot(start: Date, end: Date, policy: BookingPolicy): boolean {
    return start < end && minutesBetween(start, end) >= policy.minSlotMinutes;
  }

  // Getters
  get id(): string {
    return this.state.id;
  }

  get userId(): string {
    return this.state.userId;
  }

  get doctorId(): string {
    return this.state.doctorId;
  }

  get clinicId(): string | null {
    return this.state.clinicId;
  }

  get type(): ConsultationType {
    return this.state.type;
  }

  get status(): AppointmentStatus {
    return this.state.status;
  }

  get startTime(): Date {
    return new Date(this.state.startTime);
  }

  get endTime(): Date {
    return new Date(this.state.endTime);
  }

  get isEmergency(): boolean {
    return this.state.isEmergency;
  }

  get durationMinutes(): number {
    return minutesBetween(this.state.startTime, this.state.endTime);
  }

  get payment(): Readonly<PaymentInfo> {
    return { ...this.state.payment };
  }

  get cancellation(): Readonly<CancellationInfo> | null {
    return this.state.cancellation ? { ...this.state.cancellation } : null;
  }

  get consultation(): Readonly<ConsultationInfo> | null {
    return this.state.consultation ? { ...this.state.consultation } : null;
  }

  get confirmationCode(): string {
    return this.state.confirmationCode;
  }

  get version(): number {
    return this.state.version;
  }

  get isDeleted(): boolean {
    return this.state.deletedAt !== null;
  }

  // Guards
  canBeCancelled(now: Date = new Date()): boolean {
    return !NOT_CANCELLABLE.includes(this.state.status) && this.state.startTime > now;
  }

  canBeRescheduled(now: Date, policy: BookingPolicy): boolean {
    return (
      !NOT_RESCHEDULABLE.includes(this.state.status) &&
      minutesBetween(now, this.state.startTime) >= policy.rescheduleNoticeMinutes
    );
  }

  /** Cancelled after payment with a refund still owed. */
  requiresRefund(): boolean {
    const { cancellation, payment } = this.state;
    return (
      this.state.status === CANCELLED &&
      payment.status === PaymentStatus.PAID &&
      cancellation !== null &&
      !cancellation.refundProcessed &&
      cancellation.refundAmount > 0
    );
  }

  isFollowUpAllowed(requestedStart: Date, policy: BookingPolicy): boolean {
    const windowEnd = addMinutes(this.state.endTime, policy.followUpWindowDays * 24 * 60);
    return this.state.status === COMPLETED && requestedStart > this.state.endTime && requestedStart <= windowEnd;
  }

  /** Half-open overlap with [start, end). */
  overlaps(start: Date, end: Date): boolean {
    return this.state.startTime < end && this.state.endTime > start;
  }

  // Transitions
  confirm(now: Date = new Date()): void {
    this.assertFrom("confirm");

    this.state.status = CONFIRMED;
    this.state.confirmedAt = now;
    this.touch(now);
  }

  startConsultation(now: Date = new Date(), meeting?: MeetingDetails): void {
    this.assertFrom("startConsultation");

    this.state.status = IN_PROGRESS;
    this.state.consultation = {
      meetingId: meeting?.meetingId ?? null,
      meetingLink: meeting?.meetingLink ?? null,
      callStartedAt: now,
      callEndedAt: null,
      durationMinutes: null,
      notes: null,
    };
    this.touch(now);
  }

  complete(now: Date = new Date(), notes?: string): void {
    this.assertFrom(this.state.type === ConsultationType.OFFLINE ? "completeOffline" : "complete");

    const startedAt = this.state.consultation?.callStartedAt ?? null;

    this.state.status = COMPLETED;
    this.state.completedAt = now;
    this.state.consultation = {
      meetingId: this.state.consultation?.meetingId ?? null,
      meetingLink: this.state.consultation?.meetingLink ?? null,
      callStartedAt: startedAt,
      callEndedAt: now,
      durationMinutes: startedAt ? Math.max(0, Math.round(minutesBetween(startedAt, now))) : null,
      notes: notes ?? this.state.consultation?.notes ?? null,
    };
    this.touch(now);
  }

  cancel(
    reason: CancellationReason,
    description: string | null,
    cancelledBy: string,
    policy: BookingPolicy,
    now: Date = new Date()
  ): void {
    if (!this.canBeCancelled(now)) {
      this.reject(
        "cancel",
        this.isIn(ALLOWED_FROM.cancel) ? "Appointments can only be cancelled before they start" : undefined
      );
    }

    this.state.status = CANCELLED;
    this.state.cancellation = {
      reason,
      description,
      cancelledAt: now,
      cancelledBy,
      refundAmount: this.state.payment.status === PaymentStatus.PAID ? this.refundDueAt(now, policy) : 0,
      refundId: null,
      refundProcessed: false,
    };
    this.touch(now);
  }

  markNoShow(now: Date = new Date()): void {
    this.assertFrom("markNoShow");

    if (now < this.state.startTime) {
      this.reject("markNoShow", "An appointment can only be marked as no-show after its start time");
    }

    this.state.status = NO_SHOW;
    this.touch(now);
  }

  reschedule(newStartTime: Date, policy: BookingPolicy, now: Date = new Date()): void {
    if (!this.canBeRescheduled(now, policy)) {
      this.reject(
        "reschedule",
        this.isIn(ALLOWED_FROM.reschedule)
          ? `Appointments can only be rescheduled at least ${policy.rescheduleNoticeMinutes} minutes before they start`
          : undefined
      );
    }

    if (newStartTime <= now) {
      throw new ValidationError("New start time must be in the future", "newStartTime");
    }

    const duration = this.durationMinutes;

    this.state.rescheduledFrom = this.state.startTime;
    this.state.startTime = newStartTime;
    this.state.endTime = addMinutes(newStartTime, duration);
    this.state.appointmentDate = formatDate(newStartTime, "YYYY-MM-DD", policy.timezone);
    this.state.rescheduleCount += 1;
    this.state.status = RESCHEDULED;
    this.touch(now);
  }

  /**
   * Records a completed refund. Returns false without changes when the refund was
   * already processed.
   */
  processRefund(amount: number, refundId: string, now: Date = new Date()): boolean {
    this.assertFrom("processRefund");

    const cancellation = this.state.cancellation;
    if (cancellation?.refundProcessed) {
      return false;
    }

    if (!cancellation || this.state.payment.status !== PaymentStatus.PAID) {
      this.reject("processRefund", "There is no captured payment to refund");
    }

    const refunded = roundCurrency(Math.min(amount, this.state.payment.amount));

    this.state.cancellation = {
      ...cancellation,
      refundAmount: refunded,
      refundId,
      refundProcessed: true,
    };
    this.state.payment.status =
      refunded >= this.state.payment.amount ? PaymentStatus.REFUNDED : PaymentStatus.PARTIALLY_REFUNDED;
    this.touch(now);

    return true;
  }

  /**
   * Notes a refund the gateway accepted but has not settled. The refund stays owed,
   * so a retry under the same idempotency key picks the same refund up again.
   */
  recordPendingRefund(refundId: string, now: Date = new Date()): boolean {
    this.assertFrom("processRefund");

    const cancellation = this.state.cancellation;
    if (!cancellation || cancellation.refundProcessed || cancellation.refundId === refundId) {
      return false;
    }

    this.state.cancellation = { ...cancellation, refundId };
    this.touch(now);

    return true;
  }

  attachPaymentOrder(orderId: string, now: Date = new Date()): void {
    this.assertFrom("attachPaymentOrder");

    if (this.state.payment.status === PaymentStatus.PAID) {
      this.reject("attachPaymentOrder", "Appointment is already paid");
    }

    this.state.payment.orderId = orderId;
    this.state.payment.status = PaymentStatus.PENDING;
    this.touch(now);
  }

  /** Returns false when this exact payment was already recorded. */
  markPaid(capture: PaymentCapture, now: Date = new Date()): boolean {
    this.assertFrom("markPaid");

    if (this.state.payment.status === PaymentStatus.PAID) {
      if (this.state.payment.paymentId === capture.paymentId) {
        return false;
      }
      this.reject("markPaid", "Appointment is already paid");
    }

    this.state.payment = {
      ...this.state.payment,
      paymentId: capture.paymentId,
      orderId: capture.orderId,
      method: capture.method,
      status: PaymentStatus.PAID,
      paidAt: now,
    };
    this.touch(now);

    return true;
  }

  markPaymentFailed(now: Date = new Date()): void {
    if (this.state.payment.status === PaymentStatus.PENDING) {
      this.state.payment.status = PaymentStatus.FAILED;
      this.touch(now);
    }
  }

  recordFollowUp(followUpDate: Date, now: Date = new Date()): void {
    this.assertFrom("recordFollowUp");

    this.state.followUpDate = followUpDate;
    this.touch(now);
  }

  markDeleted(now: Date = new Date()): void {
    this.state.deletedAt = now;
    this.touch(now);
  }

  /** Called by storage after a successful write. */
  markPersisted(version: number): void {
    this.state.version = version;
  }

  toSnapshot(): AppointmentSnapshot {
    return AppointmentEntity.copy(this.state);
  }

  toJSON(): AppointmentSnapshot {
    return this.toSnapshot();
  }

  private refundDueAt(now: Date, policy: BookingPolicy): number {
    const noticeHours = minutesBetween(now, this.state.startTime) / 60;
    const percent = noticeHours >= policy.fullRefundNoticeHours ? 100 : policy.lateCancellationRefundPercent;
    return roundCurrency((this.state.payment.amount * percent) / 100);
  }

  private isIn(statuses: readonly AppointmentStatus[]): boolean {
    return statuses.includes(this.state.status);
  }

  private assertFrom(transition: Transition): void {
    if (!this.isIn(ALLOWED_FROM[transition])) {
      this.reject(transition);
    }
  }

  private reject(transition: Transition, detail?: string): never {
    throw new InvalidStateTransitionError(this.state.status, transition, ALLOWED_FROM[transition], detail);
  }

  private touch(now: Date): void {
    this.state.updatedAt = now;
  }

  private static copy(snapshot: AppointmentSnapshot): AppointmentSnapshot {
    return {
      ...snapshot,
      payment: { ...snapshot.payment },
      cancellation: snapshot.cancellation ? { ...snapshot.cancellation } : null,
      consultation: snapshot.consultation ? { ...snapshot.consultation } : null,
    };
  }
}
