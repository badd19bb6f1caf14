import { createModuleLogger } from "@/shared/config/logger";
import type { EventBus } from "@/shared/events/event-bus";
import { AppointmentEventData, EventType, EventTypes } from "@/shared/events/event.types";
import type { Actor } from "@/shared/types/auth.types";
import { UserRole, ValidationError } from "@/shared/types/common.types";
import { generateConfirmationCode, generateUUID } from "@/shared/utils/crypto";
import { addDays, addMinutes, endOfDay, roundUpToMinutes, startOfDay } from "@/shared/utils/date";
import { ClinicEntity } from "@/domains/clinics/models/clinic.model";
import type { ClinicStore } from "@/domains/clinics/repositories/clinic.repository";
import { ConsultationType, DoctorEntity } from "@/domains/doctors/models/doctor.model";
import type { DoctorStore } from "@/domains/doctors/repositories/doctor.repository";
import { NotificationEvent } from "@/domains/notifications/models/notification.model";
import type { Notifier } from "@/domains/notifications/services/notification.service";
import { PaymentGateway, PaymentGatewayError, RefundReceipt } from "@/domains/payments/services/payment.gateway";
import { InvalidStateTransitionError, SlotConflictError, VersionMismatchError } from "../models/appointment.errors";
import { AppointmentEntity, AppointmentStatus } from "../models/appointment.model";
import { BookingPolicy, DEFAULT_BOOKING_POLICY } from "../models/booking-policy";
import type { AppointmentStore } from "../repositories/appointment.repository";
import {
  AvailabilityQuery,
  AvailabilitySlot,
  BookingError,
  BookingRequest,
  BookingResult,
  BookingStats,
  CancellationRequest,
  EmergencyBookingRequest,
  FollowUpRequest,
  OperationResult,
  PaymentConfirmation,
  QueueInfo,
  RescheduleRequest,
} from "../types/booking.types";
import {
  canAccessAppointment,
  canActForPatient,
  canManageConsultation,
  canViewDoctorSchedule,
} from "./access-policy";
import { generateAvailabilitySlots, takeSlots } from "./availability.service";
import type { ConflictCheckerService } from "./conflict-checker.service";

const moduleLogger = createModuleLogger("BookingService");

type FailureCode = Exclude<BookingError, BookingError.SUCCESS>;

interface Failure {
  error: FailureCode;
  message: string;
}

interface LogContext {
  appointmentId?: string;
  doctorId?: string;
  userId?: string;
}

interface PlacementInput {
  actor: Actor;
  doctor: DoctorEntity;
  userId: string;
  clinicId: string | null;
  type: ConsultationType;
  start: Date;
  notes: string | null;
  isEmergency: boolean;
  parentAppointmentId: string | null;
}

type RefundOutcome =
  | { status: "processed" | "pending"; appointment: AppointmentEntity }
  | { status: "failed"; appointment: AppointmentEntity; failure: Failure };

interface TransitionOutcome {
  clinical: boolean;
  message: string;
  notification: NotificationEvent;
  event: EventType;
}

export interface BookingServiceDependencies {
  appointments: AppointmentStore;
  doctors: DoctorStore;
  clinics: ClinicStore;
  conflictChecker: ConflictCheckerService;
  notifier: Notifier;
  paymentGateway?: PaymentGateway | undefined;
  eventBus?: EventBus | undefined;
  policy?: BookingPolicy;
  meetingBaseUrl?: string;
  now?: () => Date;
}

// Statuses that hold a place in the doctor's queue for the day
const QUEUE_STATUSES: readonly AppointmentStatus[] = [
  AppointmentStatus.PENDING,
  AppointmentStatus.CONFIRMED,
  AppointmentStatus.RESCHEDULED,
  AppointmentStatus.IN_PROGRESS,
];

// Everything except cancellations keeps its time slot taken
const SLOT_HOLDING_STATUSES: readonly AppointmentStatus[] = Object.values(AppointmentStatus).filter(
  (status) => status !== AppointmentStatus.CANCELLED
);

const NEXT_AVAILABLE_SEARCH_DAYS = 30;
const EMERGENCY_SLOT_STEP_MINUTES = 15;
const GENERIC_FAILURE_MESSAGE = "Unable to process the request right now, please try again later";

const failure = (error: FailureCode, message: string): Failure => ({ error, message });

const refundFailed = (appointment: AppointmentEntity, message: string): RefundOutcome => ({
  status: "failed",
  appointment,
  failure: failure(BookingError.REFUND_FAILED, message),
});

// One refund per appointment: the gateway answers a repeat with the original refund
const refundIdempotencyKey = (appointmentId: string): string => `refund_${appointmentId}`;

const round2 = (value: number): number => Math.round(value * 100) / 100;

export class BookingService {
  private readonly appointments: AppointmentStore;
  private readonly doctors: DoctorStore;
  private readonly clinics: ClinicStore;
  private readonly conflictChecker: ConflictCheckerService;
  private readonly notifier: Notifier;
  private readonly paymentGateway: PaymentGateway | undefined;
  private readonly eventBus: EventBus | undefined;
  private readonly policy: BookingPolicy;
  private readonly meetingBaseUrl: string;
  private readonly now: () => Date;

  constructor(dependencies: BookingServiceDependencies) {
    this.appointments = dependencies.appointments;
    this.doctors = dependencies.doctors;
    this.clinics = dependencies.clinics;
    this.conflictChecker = dependencies.conflictChecker;
    this.notifier = dependencies.notifier;
    this.paymentGateway = dependencies.paymentGateway;
    this.eventBus = dependencies.eventBus;
    this.policy = dependencies.policy ?? DEFAULT_BOOKING_POLICY;
    this.meetingBaseUrl = dependencies.meetingBaseUrl ?? "https://meet.example.com";
    this.now = dependencies.now ?? (() => new Date());
  }

  get bookingPolicy(): BookingPolicy {
    return this.policy;
  }

  // Booking

  async bookAppointment(request: BookingRequest, actor: Actor): Promise<BookingResult> {
    const context = { doctorId: request.doctorId, userId: request.userId };

    return this.execute<BookingResult>("bookAppointment", context, async () => {
      if (!canAccessAppointment(actor, { userId: request.userId, doctorId: request.doctorId })) {
        return this.denied("bookAppointment", actor);
      }

      const now = this.now();
      const start = request.preferredStartTime;

      if (start <= now) {
        return failure(BookingError.INVALID_TIME_SLOT, "Appointment must start in the future");
      }
      if (start > addDays(now, this.policy.maxAdvanceBookingDays)) {
        return failure(
          BookingError.INVALID_TIME_SLOT,
          `Appointments can be booked at most ${this.policy.maxAdvanceBookingDays} days in advance`
        );
      }

      const doctor = await this.loadBookableDoctor(request.doctorId, request.type);
      if (!(doctor instanceof DoctorEntity)) {
        return doctor;
      }

      return this.placeBooking({
        actor,
        doctor,
        userId: request.userId,
        clinicId: request.clinicId ?? null,
        type: request.type,
        start,
        notes: request.notes ?? null,
        isEmergency: false,
        parentAppointmentId: null,
      });
    });
  }

  /**
   * Books the first emergency-ready doctor in the city whose slot is free. The
   * advance booking window does not apply.
   */
  async bookEmergencyAppointment(request: EmergencyBookingRequest, actor: Actor): Promise<BookingResult> {
    return this.execute<BookingResult>("bookEmergencyAppointment", { userId: request.userId }, async () => {
      if (!canActForPatient(actor, request.userId)) {
        return this.denied("bookEmergencyAppointment", actor);
      }

      const now = this.now();
      const start =
        request.preferredStartTime ??
        roundUpToMinutes(addMinutes(now, this.policy.emergencyLeadMinutes), EMERGENCY_SLOT_STEP_MINUTES);

      if (start <= now) {
        return failure(BookingError.INVALID_TIME_SLOT, "Appointment must start in the future");
      }

      const candidates = await this.doctors.findEmergencyCandidates(request.city, request.type);

      for (const doctor of candidates) {
        const result = await this.placeBooking({
          actor,
          doctor,
          userId: request.userId,
          clinicId: request.clinicId ?? null,
          type: request.type,
          start,
          notes: request.notes ?? null,
          isEmergency: true,
          parentAppointmentId: null,
        });

        if (result.error === BookingError.CLINIC_NOT_FOUND || result.error === BookingError.SUCCESS) {
          return result;
        }

        moduleLogger.debug({ doctorId: doctor.id, reason: result.error }, "Emergency candidate skipped");
      }

      moduleLogger.info(
        { city: request.city, type: request.type, candidates: candidates.length },
        "No doctor available for emergency booking"
      );

      return failure(
        BookingError.EMERGENCY_BOOKING_FAILED,
        `No emergency doctor is available in ${request.city} at the requested time`
      );
    });
  }

  async bookFollowUpAppointment(request: FollowUpRequest, actor: Actor): Promise<BookingResult> {
    const context = { appointmentId: request.parentAppointmentId };

    return this.execute<BookingResult>("bookFollowUpAppointment", context, async () => {
      const parent = await this.loadAccessible(request.parentAppointmentId, actor, "bookFollowUpAppointment");
      if (!(parent instanceof AppointmentEntity)) {
        return parent;
      }

      const now = this.now();
      if (request.preferredStartTime <= now) {
        return failure(BookingError.INVALID_TIME_SLOT, "Appointment must start in the future");
      }

      if (!parent.isFollowUpAllowed(request.preferredStartTime, this.policy)) {
        return failure(
          BookingError.FOLLOW_UP_NOT_ALLOWED,
          `Follow-ups must follow a completed appointment within ${this.policy.followUpWindowDays} days`
        );
      }

      const doctor = await this.loadBookableDoctor(parent.doctorId, parent.type);
      if (!(doctor instanceof DoctorEntity)) {
        return doctor;
      }

      const result = await this.placeBooking({
        actor,
        doctor,
        userId: parent.userId,
        clinicId: parent.clinicId,
        type: parent.type,
        start: request.preferredStartTime,
        notes: request.notes ?? null,
        isEmergency: false,
        parentAppointmentId: parent.id,
      });

      if (result.error === BookingError.SUCCESS) {
        await this.linkFollowUp(parent, request.preferredStartTime, now);
      }

      return result;
    });
  }

  // Changes to an existing booking

  async rescheduleAppointment(request: RescheduleRequest, actor: Actor): Promise<BookingResult> {
    return this.execute<BookingResult>(
      "rescheduleAppointment",
      { appointmentId: request.appointmentId },
      async () => {
        const appointment = await this.loadAccessible(request.appointmentId, actor, "rescheduleAppointment");
        if (!(appointment instanceof AppointmentEntity)) {
          return appointment;
        }

        const now = this.now();
        const newStart = request.newStartTime;

        if (!appointment.canBeRescheduled(now, this.policy)) {
          return failure(
            BookingError.CANNOT_RESCHEDULE,
            `Appointment cannot be rescheduled: status is ${appointment.status} or it starts in less than ` +
              `${this.policy.rescheduleNoticeMinutes} minutes`
          );
        }
        if (newStart <= now) {
          return failure(BookingError.INVALID_TIME_SLOT, "New start time must be in the future");
        }
        if (newStart > addDays(now, this.policy.maxAdvanceBookingDays)) {
          return failure(
            BookingError.INVALID_TIME_SLOT,
            `Appointments can be booked at most ${this.policy.maxAdvanceBookingDays} days in advance`
          );
        }

        const newEnd = addMinutes(newStart, appointment.durationMinutes);

        let clinic: ClinicEntity | null = null;
        if (appointment.type === ConsultationType.OFFLINE && appointment.clinicId) {
          const resolved = await this.resolveClinic(appointment.clinicId, newStart, newEnd);
          if (!(resolved instanceof ClinicEntity)) {
            return resolved;
          }
          clinic = resolved;
        }

        if (!appointment.isEmergency) {
          const doctor = await this.doctors.findById(appointment.doctorId);
          if (!doctor) {
            return failure(BookingError.DOCTOR_NOT_FOUND, "Doctor not found");
          }
          if (!this.isWithinWorkingHours(doctor, appointment.type, clinic, newStart, newEnd)) {
            return this.outsideWorkingHours(doctor.id, newStart);
          }
        }

        const conflicts = await this.conflictChecker.findConflicts({
          doctorId: appointment.doctorId,
          start: newStart,
          end: newEnd,
          excludeAppointmentId: appointment.id,
        });
        if (conflicts.length > 0) {
          return this.slotTaken(appointment.doctorId, newStart);
        }

        const expectedVersion = appointment.version;
        appointment.reschedule(newStart, this.policy, now);
        await this.appointments.reschedule(appointment, expectedVersion);

        moduleLogger.info(
          { appointmentId: appointment.id, newStartTime: newStart, rescheduledBy: actor.id },
          "Appointment rescheduled"
        );

        this.notifyParticipants(NotificationEvent.APPOINTMENT_RESCHEDULED, appointment);
        this.publishEvent(EventTypes.APPOINTMENT_RESCHEDULED, appointment, actor);

        return { error: BookingError.SUCCESS, message: "Appointment rescheduled successfully", appointment };
      },
      BookingError.CANNOT_RESCHEDULE
    );
  }

  /** Cancels and, when a paid booking is owed money back, issues the refund. */
  async cancelAppointment(request: CancellationRequest, actor: Actor): Promise<BookingResult> {
    return this.execute<BookingResult>(
      "cancelAppointment",
      { appointmentId: request.appointmentId },
      async () => {
        const appointment = await this.loadAccessible(request.appointmentId, actor, "cancelAppointment");
        if (!(appointment instanceof AppointmentEntity)) {
          return appointment;
        }

        const now = this.now();
        if (!appointment.canBeCancelled(now)) {
          return failure(
            BookingError.CANNOT_CANCEL,
            `Appointment cannot be cancelled: status is ${appointment.status} or it has already started`
          );
        }

        const expectedVersion = appointment.version;
        appointment.cancel(request.reason, request.description ?? null, actor.id, this.policy, now);
        await this.appointments.update(appointment, expectedVersion);

        moduleLogger.info(
          { appointmentId: appointment.id, reason: request.reason, cancelledBy: actor.id },
          "Appointment cancelled"
        );

        this.notifyParticipants(NotificationEvent.APPOINTMENT_CANCELLED, appointment);
        this.publishEvent(EventTypes.APPOINTMENT_CANCELLED, appointment, actor);

        // The cancellation stands even when the refund fails; it stays outstanding for a retry
        if (appointment.requiresRefund()) {
          const refund = await this.issueRefund(appointment);
          const message =
            refund.status === "processed"
              ? "Appointment cancelled and refund issued"
              : "Appointment cancelled, the refund is pending";
          return { error: BookingError.SUCCESS, message, appointment: refund.appointment };
        }

        return { error: BookingError.SUCCESS, message: "Appointment cancelled successfully", appointment };
      },
      BookingError.CANNOT_CANCEL
    );
  }

  async confirmAppointment(appointmentId: string, actor: Actor): Promise<BookingResult> {
    return this.transition(
      "confirmAppointment",
      appointmentId,
      actor,
      {
        clinical: false,
        message: "Appointment confirmed",
        notification: NotificationEvent.APPOINTMENT_CONFIRMED,
        event: EventTypes.APPOINTMENT_CONFIRMED,
      },
      (appointment, now) => appointment.confirm(now)
    );
  }

  /** Online consultations get a fresh meeting room when they start. */
  async startAppointment(appointmentId: string, actor: Actor): Promise<BookingResult> {
    return this.transition(
      "startAppointment",
      appointmentId,
      actor,
      {
        clinical: true,
        message: "Consultation started",
        notification: NotificationEvent.APPOINTMENT_STARTED,
        event: EventTypes.APPOINTMENT_STARTED,
      },
      (appointment, now) => {
        if (appointment.type !== ConsultationType.ONLINE) {
          appointment.startConsultation(now);
          return;
        }

        const meetingId = generateUUID();
        appointment.startConsultation(now, {
          meetingId,
          meetingLink: `${this.meetingBaseUrl.replace(/\/+$/, "")}/${meetingId}`,
        });
      }
    );
  }

  async completeAppointment(appointmentId: string, actor: Actor, notes?: string): Promise<BookingResult> {
    return this.transition(
      "completeAppointment",
      appointmentId,
      actor,
      {
        clinical: true,
        message: "Consultation completed",
        notification: NotificationEvent.APPOINTMENT_COMPLETED,
        event: EventTypes.APPOINTMENT_COMPLETED,
      },
      (appointment, now) => appointment.complete(now, notes)
    );
  }

  async markAppointmentNoShow(appointmentId: string, actor: Actor): Promise<BookingResult> {
    return this.transition(
      "markAppointmentNoShow",
      appointmentId,
      actor,
      {
        clinical: true,
        message: "Appointment marked as no-show",
        notification: NotificationEvent.APPOINTMENT_NO_SHOW,
        event: EventTypes.APPOINTMENT_NO_SHOW,
      },
      (appointment, now) => appointment.markNoShow(now)
    );
  }

  async deleteAppointment(appointmentId: string, actor: Actor): Promise<BookingResult> {
    return this.execute<BookingResult>("deleteAppointment", { appointmentId }, async () => {
      if (actor.role !== UserRole.ADMIN) {
        return this.denied("deleteAppointment", actor);
      }

      const appointment = await this.appointments.findById(appointmentId);
      if (!appointment || appointment.isDeleted) {
        return failure(BookingError.APPOINTMENT_NOT_FOUND, "Appointment not found");
      }

      const expectedVersion = appointment.version;
      appointment.markDeleted(this.now());
      await this.appointments.update(appointment, expectedVersion);

      moduleLogger.info({ appointmentId, deletedBy: actor.id }, "Appointment soft deleted");

      return { error: BookingError.SUCCESS, message: "Appointment deleted", appointment };
    });
  }

  // Payments

  async createPaymentOrder(appointmentId: string, actor: Actor): Promise<BookingResult> {
    return this.execute<BookingResult>("createPaymentOrder", { appointmentId }, async () => {
      const appointment = await this.loadAccessible(appointmentId, actor, "createPaymentOrder");
      if (!(appointment instanceof AppointmentEntity)) {
        return appointment;
      }

      const gateway = this.paymentGateway;
      if (!gateway) {
        return failure(BookingError.PAYMENT_FAILED, "Online payments are not configured");
      }

      const { amount, currency } = appointment.payment;
      if (amount <= 0) {
        return failure(BookingError.INVALID_STATE, "Appointment has nothing to pay");
      }

      const order = await gateway.createOrder({ amount, currency, appointmentId: appointment.id });

      const expectedVersion = appointment.version;
      appointment.attachPaymentOrder(order.orderId, this.now());
      await this.appointments.update(appointment, expectedVersion);

      return {
        error: BookingError.SUCCESS,
        message: "Payment order created",
        appointment,
        paymentUrl: order.paymentUrl,
      };
    });
  }

  /** Records a gateway-confirmed payment. Replaying the same confirmation is a no-op. */
  async recordPayment(appointmentId: string, confirmation: PaymentConfirmation, actor: Actor): Promise<BookingResult> {
    return this.execute<BookingResult>("recordPayment", { appointmentId }, async () => {
      const appointment = await this.loadAccessible(appointmentId, actor, "recordPayment");
      if (!(appointment instanceof AppointmentEntity)) {
        return appointment;
      }

      const gateway = this.paymentGateway;
      if (!gateway) {
        return failure(BookingError.PAYMENT_FAILED, "Online payments are not configured");
      }

      if (appointment.payment.orderId !== confirmation.orderId) {
        return failure(BookingError.PAYMENT_FAILED, "Payment order does not belong to this appointment");
      }

      if (!gateway.verifySignature(confirmation)) {
        moduleLogger.warn({ appointmentId, orderId: confirmation.orderId }, "Payment signature verification failed");
        return failure(BookingError.PAYMENT_FAILED, "Payment signature is invalid");
      }

      const expectedVersion = appointment.version;
      const changed = appointment.markPaid(
        { paymentId: confirmation.paymentId, orderId: confirmation.orderId, method: confirmation.method },
        this.now()
      );

      if (!changed) {
        return { error: BookingError.SUCCESS, message: "Payment already recorded", appointment };
      }

      await this.appointments.update(appointment, expectedVersion);

      moduleLogger.info({ appointmentId, paymentId: confirmation.paymentId }, "Payment recorded");

      this.notifyParticipants(NotificationEvent.PAYMENT_RECEIVED, appointment);
      this.publishEvent(EventTypes.PAYMENT_RECEIVED, appointment, actor);

      return { error: BookingError.SUCCESS, message: "Payment recorded", appointment };
    });
  }

  /** Retries an outstanding refund for a cancelled appointment. */
  async refundPayment(appointmentId: string, actor: Actor): Promise<BookingResult> {
    return this.execute<BookingResult>("refundPayment", { appointmentId }, async () => {
      const appointment = await this.loadAccessible(appointmentId, actor, "refundPayment");
      if (!(appointment instanceof AppointmentEntity)) {
        return appointment;
      }

      if (appointment.cancellation?.refundProcessed) {
        return { error: BookingError.SUCCESS, message: "Refund already processed", appointment };
      }

      if (!appointment.requiresRefund()) {
        return failure(BookingError.INVALID_STATE, "No refund is owed for this appointment");
      }

      const refund = await this.issueRefund(appointment);
      if (refund.status === "failed") {
        return refund.failure;
      }

      const message =
        refund.status === "processed" ? "Refund issued" : "Refund requested, the gateway has not settled it yet";
      return { error: BookingError.SUCCESS, message, appointment: refund.appointment };
    });
  }

  // Queries

  async getAppointment(appointmentId: string, actor: Actor): Promise<OperationResult<AppointmentEntity>> {
    return this.execute<OperationResult<AppointmentEntity>>("getAppointment", { appointmentId }, async () => {
      const appointment = await this.loadAccessible(appointmentId, actor, "getAppointment");
      if (!(appointment instanceof AppointmentEntity)) {
        return appointment;
      }
      return { error: BookingError.SUCCESS, message: "Appointment retrieved", data: appointment };
    });
  }

  async getUserAppointments(
    userId: string,
    actor: Actor,
    status?: AppointmentStatus
  ): Promise<OperationResult<AppointmentEntity[]>> {
    return this.execute<OperationResult<AppointmentEntity[]>>("getUserAppointments", { userId }, async () => {
      if (!canActForPatient(actor, userId)) {
        return this.denied("getUserAppointments", actor);
      }

      const appointments = await this.appointments.findByUser(userId, status);
      return { error: BookingError.SUCCESS, message: "Appointments retrieved", data: appointments };
    });
  }

  /** The doctor's appointments on the calendar day containing `day`. */
  async getDoctorAppointments(
    doctorId: string,
    day: Date,
    actor: Actor
  ): Promise<OperationResult<AppointmentEntity[]>> {
    return this.execute<OperationResult<AppointmentEntity[]>>("getDoctorAppointments", { doctorId }, async () => {
      if (!canViewDoctorSchedule(actor, doctorId)) {
        return this.denied("getDoctorAppointments", actor);
      }

      const { timezone } = this.policy;
      const appointments = await this.appointments.findByDoctorInRange(
        doctorId,
        startOfDay(day, timezone),
        endOfDay(day, timezone)
      );

      return { error: BookingError.SUCCESS, message: "Appointments retrieved", data: appointments };
    });
  }

  /**
   * Position counts the doctor's active appointments on the same day that start
   * earlier; the wait is that many consultations.
   */
  async getQueuePosition(appointmentId: string, actor: Actor): Promise<OperationResult<QueueInfo>> {
    return this.execute<OperationResult<QueueInfo>>("getQueuePosition", { appointmentId }, async () => {
      const appointment = await this.loadAccessible(appointmentId, actor, "getQueuePosition");
      if (!(appointment instanceof AppointmentEntity)) {
        return appointment;
      }

      const doctor = await this.doctors.findById(appointment.doctorId);
      if (!doctor) {
        return failure(BookingError.DOCTOR_NOT_FOUND, "Doctor not found");
      }

      const { timezone } = this.policy;
      const sameDay = await this.appointments.findByDoctorInRange(
        appointment.doctorId,
        startOfDay(appointment.startTime, timezone),
        endOfDay(appointment.startTime, timezone),
        QUEUE_STATUSES
      );

      const position = sameDay.filter(
        (other) => other.id !== appointment.id && other.startTime < appointment.startTime
      ).length;

      return {
        error: BookingError.SUCCESS,
        message: "Queue position calculated",
        data: { position, estimatedWaitMinutes: position * doctor.consultationDurationMinutes },
      };
    });
  }

  async getEstimatedWaitTime(appointmentId: string, actor: Actor): Promise<OperationResult<number>> {
    const queue = await this.getQueuePosition(appointmentId, actor);
    if (queue.error !== BookingError.SUCCESS) {
      return queue;
    }
    return { error: BookingError.SUCCESS, message: "Estimated wait calculated", data: queue.data.estimatedWaitMinutes };
  }

  async getDoctorAvailability(query: AvailabilityQuery): Promise<OperationResult<AvailabilitySlot[]>> {
    const context = { doctorId: query.doctorId };

    return this.execute<OperationResult<AvailabilitySlot[]>>("getDoctorAvailability", context, async () => {
      if (query.endDate <= query.startDate) {
        return failure(BookingError.VALIDATION_ERROR, "endDate must be after startDate");
      }

      const slots = await this.availableSlots(query);
      if (!isSlotIterable(slots)) {
        return slots;
      }

      return { error: BookingError.SUCCESS, message: "Availability retrieved", data: Array.from(slots) };
    });
  }

  /** The first `count` free slots within the next thirty days. */
  async getNextAvailableSlots(
    doctorId: string,
    type: ConsultationType,
    count: number = 5,
    clinicId?: string | null
  ): Promise<OperationResult<AvailabilitySlot[]>> {
    return this.execute<OperationResult<AvailabilitySlot[]>>("getNextAvailableSlots", { doctorId }, async () => {
      const now = this.now();
      const slots = await this.availableSlots({
        doctorId,
        type,
        clinicId: clinicId ?? null,
        startDate: now,
        endDate: addDays(now, NEXT_AVAILABLE_SEARCH_DAYS),
      });
      if (!isSlotIterable(slots)) {
        return slots;
      }

      return { error: BookingError.SUCCESS, message: "Next available slots retrieved", data: takeSlots(slots, count) };
    });
  }

  async getBookingStats(doctorId: string, actor: Actor, days: number = 30): Promise<OperationResult<BookingStats>> {
    return this.execute<OperationResult<BookingStats>>("getBookingStats", { doctorId }, async () => {
      if (!canViewDoctorSchedule(actor, doctorId)) {
        return this.denied("getBookingStats", actor);
      }

      const since = addDays(this.now(), -days);
      const counts = await this.appointments.countByStatusForDoctor(doctorId, since);

      const byStatus: Record<AppointmentStatus, number> = {
        [AppointmentStatus.PENDING]: 0,
        [AppointmentStatus.CONFIRMED]: 0,
        [AppointmentStatus.IN_PROGRESS]: 0,
        [AppointmentStatus.COMPLETED]: 0,
        [AppointmentStatus.CANCELLED]: 0,
        [AppointmentStatus.NO_SHOW]: 0,
        [AppointmentStatus.RESCHEDULED]: 0,
      };
      let paidCount = 0;
      let paidAmount = 0;

      for (const entry of counts) {
        byStatus[entry.status] += entry.count;
        paidCount += entry.paidCount;
        paidAmount += entry.paidAmount;
      }

      const total = Object.values(byStatus).reduce((sum, count) => sum + count, 0);

      return {
        error: BookingError.SUCCESS,
        message: "Booking statistics retrieved",
        data: {
          doctorId,
          since,
          total,
          byStatus,
          cancellationRate: total > 0 ? round2((byStatus[AppointmentStatus.CANCELLED] / total) * 100) : 0,
          averagePaidAmount: paidCount > 0 ? round2(paidAmount / paidCount) : 0,
        },
      };
    });
  }

  // Internals

  /**
   * Shared tail of every booking flow: clinic and working-hours checks, conflict pre-check, then the
   * atomic insert. Storage repeats the overlap check under a doctor lock.
   */
  private async placeBooking(input: PlacementInput): Promise<BookingResult> {
    const { doctor, type, start } = input;
    const end = addMinutes(start, doctor.consultationDurationMinutes);
    const clinicId = type === ConsultationType.OFFLINE ? input.clinicId : null;

    let clinic: ClinicEntity | null = null;
    if (clinicId) {
      if (!doctor.worksAtClinic(clinicId)) {
        return failure(BookingError.DOCTOR_NOT_AVAILABLE, "Doctor does not practise at the selected clinic");
      }

      const resolved = await this.resolveClinic(clinicId, start, end);
      if (!(resolved instanceof ClinicEntity)) {
        return resolved;
      }
      clinic = resolved;
    }

    // Emergency doctors are on call outside their weekly hours
    if (!input.isEmergency && !this.isWithinWorkingHours(doctor, type, clinic, start, end)) {
      return this.outsideWorkingHours(doctor.id, start);
    }

    const free = await this.conflictChecker.isSlotFree({ doctorId: doctor.id, start, end });
    if (!free) {
      return this.slotTaken(doctor.id, start);
    }

    const appointment = AppointmentEntity.create(
      {
        id: generateUUID(),
        userId: input.userId,
        doctorId: doctor.id,
        clinicId,
        type,
        startTime: start,
        endTime: end,
        fee: doctor.consultationFee,
        confirmationCode: generateConfirmationCode(),
        notes: input.notes,
        isEmergency: input.isEmergency,
        parentAppointmentId: input.parentAppointmentId,
      },
      this.policy,
      this.now()
    );

    try {
      await this.appointments.insert(appointment);
    } catch (error) {
      if (error instanceof SlotConflictError) {
        return this.slotTaken(doctor.id, start);
      }
      throw error;
    }

    moduleLogger.info(
      {
        appointmentId: appointment.id,
        doctorId: doctor.id,
        userId: input.userId,
        startTime: start,
        isEmergency: input.isEmergency,
        bookedBy: input.actor.id,
      },
      "Appointment booked"
    );

    const paymentUrl = await this.openPaymentOrder(appointment);

    this.notifyParticipants(NotificationEvent.APPOINTMENT_BOOKED, appointment);
    this.publishEvent(EventTypes.APPOINTMENT_BOOKED, appointment, input.actor);

    const result: BookingResult = {
      error: BookingError.SUCCESS,
      message: "Appointment booked successfully",
      appointment,
    };
    if (paymentUrl) {
      result.paymentUrl = paymentUrl;
    }
    return result;
  }

  // A failed order leaves the booking in place; the patient can request a new order later
  private async openPaymentOrder(appointment: AppointmentEntity): Promise<string | undefined> {
    const gateway = this.paymentGateway;
    const { amount, currency } = appointment.payment;

    if (!gateway || amount <= 0) {
      return undefined;
    }

    try {
      const order = await gateway.createOrder({ amount, currency, appointmentId: appointment.id });
      const expectedVersion = appointment.version;
      appointment.attachPaymentOrder(order.orderId, this.now());
      await this.appointments.update(appointment, expectedVersion);
      return order.paymentUrl;
    } catch (error) {
      moduleLogger.warn({ error, appointmentId: appointment.id }, "Payment order could not be created for booking");
      return undefined;
    }
  }

  private async issueRefund(appointment: AppointmentEntity): Promise<RefundOutcome> {
    const gateway = this.paymentGateway;
    const cancellation = appointment.cancellation;
    const paymentId = appointment.payment.paymentId;

    if (!gateway || !cancellation || !paymentId) {
      moduleLogger.warn({ appointmentId: appointment.id }, "Refund owed but no gateway or payment id is available");
      return refundFailed(appointment, "Refund cannot be issued without a captured payment");
    }

    let receipt: RefundReceipt;
    try {
      receipt = await gateway.refund({
        paymentId,
        amount: cancellation.refundAmount,
        reason: cancellation.reason,
        idempotencyKey: refundIdempotencyKey(appointment.id),
      });
    } catch (error) {
      if (error instanceof PaymentGatewayError) {
        moduleLogger.error({ error, appointmentId: appointment.id, paymentId }, "Refund request failed");
        return refundFailed(appointment, "Refund could not be processed, it will be retried");
      }
      throw error;
    }

    // Recorded on a copy so a failed write leaves the caller holding what storage holds
    const recorded = AppointmentEntity.fromSnapshot(appointment.toSnapshot());
    const now = this.now();
    const settled = receipt.status === "processed";
    const changed = settled
      ? recorded.processRefund(receipt.amount, receipt.refundId, now)
      : recorded.recordPendingRefund(receipt.refundId, now);

    if (changed) {
      try {
        await this.appointments.update(recorded, appointment.version);
      } catch (error) {
        moduleLogger.error(
          { error, appointmentId: appointment.id, refundId: receipt.refundId },
          "Refund was issued but could not be recorded"
        );
        return refundFailed(appointment, "Refund was issued but could not be recorded, it will be reconciled");
      }
    }

    if (!settled) {
      moduleLogger.info({ appointmentId: appointment.id, refundId: receipt.refundId }, "Refund pending at the gateway");
      return { status: "pending", appointment: recorded };
    }

    if (changed) {
      this.notifier.notify(NotificationEvent.REFUND_PROCESSED, recorded.id, recorded.userId);
      this.publishEvent(EventTypes.REFUND_PROCESSED, recorded);
    }

    moduleLogger.info(
      { appointmentId: appointment.id, refundId: receipt.refundId, amount: receipt.amount },
      "Refund processed"
    );

    return { status: "processed", appointment: recorded };
  }

  private async linkFollowUp(parent: AppointmentEntity, followUpDate: Date, now: Date): Promise<void> {
    try {
      const expectedVersion = parent.version;
      parent.recordFollowUp(followUpDate, now);
      await this.appointments.update(parent, expectedVersion);
    } catch (error) {
      moduleLogger.warn({ error, appointmentId: parent.id }, "Follow-up date could not be recorded on the parent");
    }
  }

  /**
   * Loads, applies one entity transition and persists with a version check. The
   * patient hears about it once the write succeeded. Clinical transitions are
   * restricted to the treating doctor and admins.
   */
  private async transition(
    operation: string,
    appointmentId: string,
    actor: Actor,
    outcome: TransitionOutcome,
    apply: (appointment: AppointmentEntity, now: Date) => void
  ): Promise<BookingResult> {
    return this.execute<BookingResult>(operation, { appointmentId }, async () => {
      const appointment = await this.loadAccessible(appointmentId, actor, operation);
      if (!(appointment instanceof AppointmentEntity)) {
        return appointment;
      }

      if (outcome.clinical && !canManageConsultation(actor, appointment)) {
        return this.denied(operation, actor);
      }

      const expectedVersion = appointment.version;
      apply(appointment, this.now());
      await this.appointments.update(appointment, expectedVersion);

      moduleLogger.info({ appointmentId, status: appointment.status, actorId: actor.id }, outcome.message);

      this.notifier.notify(outcome.notification, appointment.id, appointment.userId);
      this.publishEvent(outcome.event, appointment, actor);

      return { error: BookingError.SUCCESS, message: outcome.message, appointment };
    });
  }

  private async loadAccessible(
    appointmentId: string,
    actor: Actor,
    operation: string
  ): Promise<AppointmentEntity | Failure> {
    const appointment = await this.appointments.findById(appointmentId);
    if (!appointment || appointment.isDeleted) {
      return failure(BookingError.APPOINTMENT_NOT_FOUND, "Appointment not found");
    }

    if (!canAccessAppointment(actor, appointment)) {
      return this.denied(operation, actor);
    }

    return appointment;
  }

  private async loadBookableDoctor(doctorId: string, type: ConsultationType): Promise<DoctorEntity | Failure> {
    const doctor = await this.doctors.findById(doctorId);

    if (!doctor) {
      return failure(BookingError.DOCTOR_NOT_FOUND, "Doctor not found");
    }
    if (!doctor.isVerified()) {
      return failure(BookingError.DOCTOR_NOT_VERIFIED, "Doctor is not verified");
    }
    if (!doctor.isAcceptingAppointments) {
      return failure(BookingError.DOCTOR_NOT_AVAILABLE, "Doctor is not accepting appointments");
    }
    if (!doctor.supportsConsultationType(type)) {
      return failure(BookingError.DOCTOR_NOT_AVAILABLE, `Doctor does not offer ${type} consultations`);
    }

    return doctor;
  }

  private async resolveClinic(clinicId: string, start: Date, end: Date): Promise<ClinicEntity | Failure> {
    const clinic = await this.clinics.findById(clinicId);

    if (!clinic) {
      return failure(BookingError.CLINIC_NOT_FOUND, "Clinic not found");
    }
    if (!clinic.isOperational()) {
      return failure(BookingError.CLINIC_CLOSED, "Clinic is not accepting bookings");
    }
    if (!clinic.isOpenDuring(start, end)) {
      return failure(BookingError.CLINIC_CLOSED, "Clinic is closed at the requested time");
    }

    return clinic;
  }

  private async availableSlots(query: AvailabilityQuery): Promise<Iterable<AvailabilitySlot> | Failure> {
    const doctor = await this.doctors.findById(query.doctorId);
    if (!doctor) {
      return failure(BookingError.DOCTOR_NOT_FOUND, "Doctor not found");
    }
    if (!doctor.isVerified()) {
      return failure(BookingError.DOCTOR_NOT_VERIFIED, "Doctor is not verified");
    }
    if (!doctor.supportsConsultationType(query.type)) {
      return failure(BookingError.DOCTOR_NOT_AVAILABLE, `Doctor does not offer ${query.type} consultations`);
    }
    if (!doctor.isAcceptingAppointments) {
      return [];
    }

    let clinic: ClinicEntity | null = null;
    if (query.type === ConsultationType.OFFLINE && query.clinicId) {
      clinic = await this.clinics.findById(query.clinicId);
      if (!clinic) {
        return failure(BookingError.CLINIC_NOT_FOUND, "Clinic not found");
      }
      if (!clinic.isOperational() || !doctor.worksAtClinic(clinic.id)) {
        return [];
      }
    }

    const now = this.now();
    const horizon = addDays(now, this.policy.maxAdvanceBookingDays);
    const to = query.endDate < horizon ? query.endDate : horizon;

    const booked = await this.appointments.findByDoctorInRange(
      doctor.id,
      query.startDate,
      to,
      SLOT_HOLDING_STATUSES
    );

    return generateAvailabilitySlots({
      doctor,
      clinic,
      type: query.type,
      from: query.startDate,
      to,
      booked: booked.map((appointment) => ({ start: appointment.startTime, end: appointment.endTime })),
      now,
      timezone: this.policy.timezone,
    });
  }

  // In-person visits follow the clinic's clock, everything else the engine's
  private isWithinWorkingHours(
    doctor: DoctorEntity,
    type: ConsultationType,
    clinic: ClinicEntity | null,
    start: Date,
    end: Date
  ): boolean {
    const timezone = clinic?.timezone ?? this.policy.timezone;
    return doctor.isAvailableDuring(start, end, timezone, type, clinic?.id);
  }

  private outsideWorkingHours(doctorId: string, start: Date): Failure {
    moduleLogger.info({ doctorId, startTime: start }, "Requested time is outside the doctor's working hours");
    return failure(BookingError.DOCTOR_NOT_AVAILABLE, "Doctor is not available at the requested time");
  }

  private slotTaken(doctorId: string, start?: Date): Failure {
    moduleLogger.info({ doctorId, startTime: start }, "Requested time slot is already booked");
    return failure(BookingError.TIME_SLOT_OCCUPIED, "The requested time slot is already booked");
  }

  private denied(operation: string, actor: Actor): Failure {
    moduleLogger.info({ operation, actorId: actor.id, role: actor.role }, "Access to appointment denied");
    return failure(BookingError.UNAUTHORIZED_ACCESS, "You do not have access to this appointment");
  }

  private notifyParticipants(event: NotificationEvent, appointment: AppointmentEntity): void {
    this.notifier.notify(event, appointment.id, appointment.userId);
    this.notifier.notify(event, appointment.id, appointment.doctorId);
  }

  private publishEvent(type: EventType, appointment: AppointmentEntity, actor?: Actor): void {
    const eventBus = this.eventBus;
    if (!eventBus) return;

    const data: AppointmentEventData = {
      appointmentId: appointment.id,
      userId: appointment.userId,
      doctorId: appointment.doctorId,
      status: appointment.status,
      startTime: appointment.startTime.toISOString(),
      endTime: appointment.endTime.toISOString(),
    };

    const event = eventBus.createEvent(type, appointment.id, "appointment", data, appointment.version, actor?.id);

    eventBus.publish(event).catch((error: unknown) => {
      moduleLogger.error({ error, eventType: type, appointmentId: appointment.id }, "Failed to publish event");
    });
  }

  /**
   * Runs one operation, turning expected domain errors into typed results. Anything
   * else is an infrastructure failure: logged with timing and reported generically.
   */
  private async execute<R>(
    operation: string,
    context: LogContext,
    work: () => Promise<R | Failure>,
    stateError: FailureCode = BookingError.INVALID_STATE
  ): Promise<R | Failure> {
    const startedAt = Date.now();

    try {
      return await work();
    } catch (error) {
      if (error instanceof InvalidStateTransitionError) {
        moduleLogger.info({ operation, ...context, status: error.currentStatus }, error.message);
        return failure(stateError, error.message);
      }
      if (error instanceof SlotConflictError) {
        return this.slotTaken(error.doctorId);
      }
      if (error instanceof VersionMismatchError) {
        moduleLogger.info({ operation, ...context }, "Concurrent modification detected");
        return failure(BookingError.BOOKING_CONFLICT, "Appointment was modified by another request, please retry");
      }
      if (error instanceof ValidationError) {
        return failure(BookingError.VALIDATION_ERROR, error.message);
      }
      if (error instanceof PaymentGatewayError) {
        moduleLogger.error({ error, operation, ...context }, "Payment gateway call failed");
        return failure(BookingError.PAYMENT_FAILED, "Payment could not be processed, please try again later");
      }

      moduleLogger.error(
        { error, operation, ...context, durationMs: Date.now() - startedAt },
        `Booking operation failed: ${operation}`
      );
      return failure(BookingError.DATABASE_ERROR, GENERIC_FAILURE_MESSAGE);
    }
  }
}

const isSlotIterable = (value: Iterable<AvailabilitySlot> | Failure): value is Iterable<AvailabilitySlot> =>
  Symbol.iterator in value;
