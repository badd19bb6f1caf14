import { describe, expect, it } from "vitest";
import { ValidationError } from "@/shared/types/common.types";
import { ConsultationType } from "@/domains/doctors/models/doctor.model";
import { buildAppointment } from "@/__tests__/helpers/builders";
import {
  AppointmentEntity,
  AppointmentStatus,
  CancellationReason,
  PaymentMethod,
  PaymentStatus,
} from "../models/appointment.model";
import { InvalidStateTransitionError } from "../models/appointment.errors";
import { DEFAULT_BOOKING_POLICY } from "../models/booking-policy";

const NOW = new Date("2025-03-01T08:00:00Z");
const START = new Date("2025-03-01T10:00:00Z");
const policy = DEFAULT_BOOKING_POLICY;

const capture = (paymentId: string = "pay_1") => ({ paymentId, orderId: "order_1", method: PaymentMethod.UPI });

const paidAppointment = (): AppointmentEntity => {
  const appointment = buildAppointment({ startTime: START }, NOW);
  appointment.markPaid(capture(), NOW);
  return appointment;
};

const OPERATIONS = [
  "confirm",
  "startConsultation",
  "complete",
  "cancel",
  "markNoShow",
  "reschedule",
  "processRefund",
] as const;

type Operation = (typeof OPERATIONS)[number];

const { PENDING, CONFIRMED, IN_PROGRESS, COMPLETED, CANCELLED, NO_SHOW, RESCHEDULED } = AppointmentStatus;

const LEGAL_FROM: Record<Operation, readonly AppointmentStatus[]> = {
  confirm: [PENDING],
  startConsultation: [CONFIRMED, RESCHEDULED],
  complete: [IN_PROGRESS],
  cancel: [PENDING, CONFIRMED, RESCHEDULED, IN_PROGRESS],
  markNoShow: [PENDING, CONFIRMED, RESCHEDULED],
  reschedule: [PENDING, CONFIRMED, RESCHEDULED],
  processRefund: [CANCELLED],
};

const apply: Record<Operation, (appointment: AppointmentEntity) => void> = {
  confirm: (appointment) => appointment.confirm(NOW),
  startConsultation: (appointment) => appointment.startConsultation(NOW),
  complete: (appointment) => appointment.complete(NOW),
  cancel: (appointment) => appointment.cancel(CancellationReason.OTHER, null, "admin-1", policy, NOW),
  markNoShow: (appointment) => appointment.markNoShow(NOW),
  reschedule: (appointment) => appointment.reschedule(new Date("2025-03-02T10:00:00Z"), policy, NOW),
  processRefund: (appointment) => {
    appointment.processRefund(500, "rfnd_1", NOW);
  },
};

const inStatus: Record<AppointmentStatus, () => AppointmentEntity> = {
  [PENDING]: () => paidAppointment(),
  [CONFIRMED]: () => {
    const appointment = paidAppointment();
    appointment.confirm(NOW);
    return appointment;
  },
  [RESCHEDULED]: () => {
    const appointment = inStatus[CONFIRMED]();
    appointment.reschedule(new Date("2025-03-01T12:00:00Z"), policy, NOW);
    return appointment;
  },
  [IN_PROGRESS]: () => {
    const appointment = inStatus[CONFIRMED]();
    appointment.startConsultation(START);
    return appointment;
  },
  [COMPLETED]: () => {
    const appointment = inStatus[IN_PROGRESS]();
    appointment.complete(new Date("2025-03-01T10:30:00Z"));
    return appointment;
  },
  [CANCELLED]: () => {
    const appointment = paidAppointment();
    appointment.cancel(CancellationReason.PATIENT_REQUEST, null, "patient-1", policy, NOW);
    return appointment;
  },
  [NO_SHOW]: () => {
    const appointment = inStatus[CONFIRMED]();
    appointment.markNoShow(new Date("2025-03-01T10:31:00Z"));
    return appointment;
  },
};

const illegalPairs = Object.values(AppointmentStatus).flatMap((status) =>
  OPERATIONS.filter((operation) => !LEGAL_FROM[operation].includes(status)).map(
    (operation): [Operation, AppointmentStatus] => [operation, status]
  )
);

describe("AppointmentEntity", () => {
  describe("create", () => {
    it("starts pending at version 1 with the fee as the amount due", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);

      expect(appointment.status).toBe(AppointmentStatus.PENDING);
      expect(appointment.version).toBe(1);
      expect(appointment.endTime.toISOString()).toBe("2025-03-01T10:30:00.000Z");
      expect(appointment.payment).toEqual({
        paymentId: null,
        orderId: null,
        amount: 500,
        currency: "INR",
        status: PaymentStatus.PENDING,
        method: null,
        paidAt: null,
      });
      expect(appointment.toSnapshot().appointmentDate).toBe("2025-03-01");
      expect(appointment.toSnapshot().isFollowUp).toBe(false);
    });

    it("rejects slots shorter than the minimum length", () => {
      expect(() =>
        buildAppointment({ startTime: START, endTime: new Date("2025-03-01T10:10:00Z") }, NOW)
      ).toThrow(ValidationError);
    });

    it("rejects an end time before the start", () => {
      expect(() =>
        buildAppointment({ startTime: START, endTime: new Date("2025-03-01T09:30:00Z") }, NOW)
      ).toThrow("Appointment must last at least 15 minutes and end after it starts");
    });

    it("marks bookings with a parent as follow-ups", () => {
      const appointment = buildAppointment({ startTime: START, parentAppointmentId: "parent-1" }, NOW);

      expect(appointment.toSnapshot().isFollowUp).toBe(true);
      expect(appointment.toSnapshot().parentAppointmentId).toBe("parent-1");
    });
  });

  describe("overlaps", () => {
    const appointment = buildAppointment({ startTime: START }, NOW);

    it("treats intervals as half-open", () => {
      expect(appointment.overlaps(new Date("2025-03-01T10:30:00Z"), new Date("2025-03-01T11:00:00Z"))).toBe(false);
      expect(appointment.overlaps(new Date("2025-03-01T09:30:00Z"), new Date("2025-03-01T10:00:00Z"))).toBe(false);
    });

    it("detects partial and enclosing overlaps", () => {
      expect(appointment.overlaps(new Date("2025-03-01T10:15:00Z"), new Date("2025-03-01T10:45:00Z"))).toBe(true);
      expect(appointment.overlaps(new Date("2025-03-01T09:00:00Z"), new Date("2025-03-01T12:00:00Z"))).toBe(true);
    });
  });

  describe("confirm", () => {
    it("moves a pending appointment to confirmed", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);

      appointment.confirm(NOW);

      expect(appointment.status).toBe(AppointmentStatus.CONFIRMED);
      expect(appointment.toSnapshot().confirmedAt).toEqual(NOW);
    });

    it("refuses a second confirmation and leaves the state alone", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.confirm(NOW);
      const before = appointment.toSnapshot();

      expect(() => appointment.confirm(NOW)).toThrow(
        "Cannot confirm an appointment in status confirmed (allowed from: pending)"
      );
      expect(appointment.toSnapshot()).toEqual(before);
    });
  });

  describe("consultation lifecycle", () => {
    it("cannot start before being confirmed", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);

      expect(() => appointment.startConsultation(START)).toThrow(InvalidStateTransitionError);
      expect(appointment.status).toBe(AppointmentStatus.PENDING);
      expect(appointment.consultation).toBeNull();
    });

    it("records meeting details and the call duration", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.confirm(NOW);

      appointment.startConsultation(START, { meetingId: "meeting-1", meetingLink: "https://meet.test/meeting-1" });
      appointment.complete(new Date("2025-03-01T10:25:00Z"), "Rest and fluids");

      expect(appointment.status).toBe(AppointmentStatus.COMPLETED);
      expect(appointment.consultation).toEqual({
        meetingId: "meeting-1",
        meetingLink: "https://meet.test/meeting-1",
        callStartedAt: START,
        callEndedAt: new Date("2025-03-01T10:25:00Z"),
        durationMinutes: 25,
        notes: "Rest and fluids",
      });
    });

    it("requires an online consultation to be in progress before completing", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.confirm(NOW);

      expect(() => appointment.complete(START)).toThrow(InvalidStateTransitionError);
      expect(appointment.status).toBe(AppointmentStatus.CONFIRMED);
    });

    it("lets an in-person visit complete straight from confirmed", () => {
      const appointment = buildAppointment(
        { startTime: START, type: ConsultationType.OFFLINE, clinicId: "clinic-1" },
        NOW
      );
      appointment.confirm(NOW);

      appointment.complete(new Date("2025-03-01T10:30:00Z"));

      expect(appointment.status).toBe(AppointmentStatus.COMPLETED);
      expect(appointment.consultation?.durationMinutes).toBeNull();
    });
  });

  describe("cancel", () => {
    it("is refused once the appointment has started", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.confirm(NOW);
      const justAfterStart = new Date("2025-03-01T10:01:00Z");

      expect(appointment.canBeCancelled(justAfterStart)).toBe(false);
      expect(() =>
        appointment.cancel(CancellationReason.PATIENT_REQUEST, null, "patient-1", policy, justAfterStart)
      ).toThrow("Appointments can only be cancelled before they start");
      expect(appointment.status).toBe(AppointmentStatus.CONFIRMED);
    });

    it("owes nothing when the booking was never paid", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);

      appointment.cancel(CancellationReason.PATIENT_REQUEST, "Feeling better", "patient-1", policy, NOW);

      expect(appointment.status).toBe(AppointmentStatus.CANCELLED);
      expect(appointment.cancellation?.refundAmount).toBe(0);
      expect(appointment.requiresRefund()).toBe(false);
    });

    it("refunds in full with enough notice", () => {
      const appointment = paidAppointment();

      appointment.cancel(CancellationReason.PATIENT_REQUEST, null, "patient-1", policy, new Date("2025-02-27T10:00:00Z"));

      expect(appointment.cancellation?.refundAmount).toBe(500);
      expect(appointment.requiresRefund()).toBe(true);
    });

    it("applies the late cancellation percentage inside the notice window", () => {
      const appointment = paidAppointment();

      appointment.cancel(
        CancellationReason.PATIENT_REQUEST,
        null,
        "patient-1",
        { ...policy, lateCancellationRefundPercent: 50 },
        NOW
      );

      expect(appointment.cancellation?.refundAmount).toBe(250);
    });

    it("cannot cancel twice", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.cancel(CancellationReason.OTHER, null, "patient-1", policy, NOW);

      expect(() => appointment.cancel(CancellationReason.OTHER, null, "patient-1", policy, NOW)).toThrow(
        "Cannot cancel an appointment in status cancelled (allowed from: pending, confirmed, rescheduled, in_progress)"
      );
    });
  });

  describe("processRefund", () => {
    it("records the refund once and ignores repeats", () => {
      const appointment = paidAppointment();
      appointment.cancel(CancellationReason.DOCTOR_UNAVAILABLE, null, "admin-1", policy, NOW);

      expect(appointment.processRefund(500, "rfnd_1", NOW)).toBe(true);
      expect(appointment.processRefund(500, "rfnd_2", NOW)).toBe(false);

      expect(appointment.cancellation?.refundId).toBe("rfnd_1");
      expect(appointment.cancellation?.refundProcessed).toBe(true);
      expect(appointment.payment.status).toBe(PaymentStatus.REFUNDED);
      expect(appointment.requiresRefund()).toBe(false);
    });

    it("marks a smaller refund as partial", () => {
      const appointment = paidAppointment();
      appointment.cancel(CancellationReason.PATIENT_REQUEST, null, "patient-1", policy, NOW);

      appointment.processRefund(200, "rfnd_1", NOW);

      expect(appointment.payment.status).toBe(PaymentStatus.PARTIALLY_REFUNDED);
      expect(appointment.cancellation?.refundAmount).toBe(200);
    });

    it("is only possible for cancelled appointments", () => {
      const appointment = paidAppointment();

      expect(() => appointment.processRefund(500, "rfnd_1", NOW)).toThrow(InvalidStateTransitionError);
    });

    it("keeps a pending refund owed until it settles", () => {
      const appointment = paidAppointment();
      appointment.cancel(CancellationReason.PATIENT_REQUEST, null, "patient-1", policy, NOW);

      expect(appointment.recordPendingRefund("rfnd_1", NOW)).toBe(true);
      expect(appointment.recordPendingRefund("rfnd_1", NOW)).toBe(false);
      expect(appointment.cancellation).toMatchObject({ refundId: "rfnd_1", refundProcessed: false });
      expect(appointment.payment.status).toBe(PaymentStatus.PAID);
      expect(appointment.requiresRefund()).toBe(true);

      expect(appointment.processRefund(500, "rfnd_1", NOW)).toBe(true);
      expect(appointment.payment.status).toBe(PaymentStatus.REFUNDED);
      expect(appointment.recordPendingRefund("rfnd_2", NOW)).toBe(false);
    });
  });

  describe("transition table", () => {
    it("builds every status it checks", () => {
      for (const status of Object.values(AppointmentStatus)) {
        expect(inStatus[status]().status).toBe(status);
      }
    });

    it.each(illegalPairs)("refuses %s from %s and changes nothing", (operation, status) => {
      const appointment = inStatus[status]();
      const before = appointment.toSnapshot();

      expect(() => apply[operation](appointment)).toThrow(InvalidStateTransitionError);
      expect(appointment.toSnapshot()).toEqual(before);
    });
  });

  describe("markPaid", () => {
    it("treats a replayed payment as a no-op", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);

      expect(appointment.markPaid(capture(), NOW)).toBe(true);
      expect(appointment.markPaid(capture(), NOW)).toBe(false);
      expect(appointment.payment.paidAt).toEqual(NOW);
    });

    it("refuses a different payment for a paid appointment", () => {
      const appointment = paidAppointment();

      expect(() => appointment.markPaid(capture("pay_2"), NOW)).toThrow("Appointment is already paid");
      expect(appointment.payment.paymentId).toBe("pay_1");
    });
  });

  describe("markNoShow", () => {
    it("is only allowed once the start time has passed", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.confirm(NOW);

      expect(() => appointment.markNoShow(NOW)).toThrow(
        "An appointment can only be marked as no-show after its start time"
      );

      appointment.markNoShow(new Date("2025-03-01T10:20:00Z"));
      expect(appointment.status).toBe(AppointmentStatus.NO_SHOW);
    });
  });

  describe("reschedule", () => {
    it("keeps the original duration", () => {
      const appointment = buildAppointment(
        { startTime: START, endTime: new Date("2025-03-01T10:45:00Z") },
        NOW
      );
      const newStart = new Date("2025-03-02T12:00:00Z");

      appointment.reschedule(newStart, policy, NOW);

      const snapshot = appointment.toSnapshot();
      expect(appointment.endTime.toISOString()).toBe("2025-03-02T12:45:00.000Z");
      expect(appointment.status).toBe(AppointmentStatus.RESCHEDULED);
      expect(snapshot.rescheduledFrom).toEqual(START);
      expect(snapshot.rescheduleCount).toBe(1);
      expect(snapshot.appointmentDate).toBe("2025-03-02");
    });

    it("accepts exactly the minimum notice", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);

      expect(appointment.canBeRescheduled(NOW, policy)).toBe(true);
    });

    it("refuses with less notice", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      const late = new Date("2025-03-01T08:30:00Z");

      expect(() => appointment.reschedule(new Date("2025-03-02T12:00:00Z"), policy, late)).toThrow(
        "Appointments can only be rescheduled at least 120 minutes before they start"
      );
      expect(appointment.startTime).toEqual(START);
    });

    it("lets a rescheduled appointment go on to start", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.reschedule(new Date("2025-03-01T11:00:00Z"), policy, NOW);

      appointment.startConsultation(new Date("2025-03-01T11:00:00Z"));

      expect(appointment.status).toBe(AppointmentStatus.IN_PROGRESS);
    });
  });

  describe("follow-ups", () => {
    it("are allowed within the window after completion", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      appointment.confirm(NOW);
      appointment.startConsultation(START);
      appointment.complete(new Date("2025-03-01T10:30:00Z"));

      expect(appointment.isFollowUpAllowed(new Date("2025-03-20T10:00:00Z"), policy)).toBe(true);
      expect(appointment.isFollowUpAllowed(new Date("2025-04-01T10:00:00Z"), policy)).toBe(false);
    });

    it("are not allowed before completion", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);

      expect(appointment.isFollowUpAllowed(new Date("2025-03-05T10:00:00Z"), policy)).toBe(false);
    });
  });

  describe("snapshots", () => {
    it("do not share state with the entity", () => {
      const appointment = buildAppointment({ startTime: START }, NOW);
      const snapshot = appointment.toSnapshot();

      snapshot.payment.amount = 1;
      const restored = AppointmentEntity.fromSnapshot(snapshot);
      snapshot.status = AppointmentStatus.CANCELLED;

      expect(appointment.payment.amount).toBe(500);
      expect(restored.payment.amount).toBe(1);
      expect(restored.status).toBe(AppointmentStatus.PENDING);
    });
  });
});
