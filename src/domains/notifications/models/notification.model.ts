// Appointment lifecycle moments a participant is told about
export enum NotificationEvent {
  APPOINTMENT_BOOKED = "appointment_booked",
  APPOINTMENT_CONFIRMED = "appointment_confirmed",
  APPOINTMENT_RESCHEDULED = "appointment_rescheduled",
  APPOINTMENT_CANCELLED = "appointment_cancelled",
  APPOINTMENT_STARTED = "appointment_started",
  APPOINTMENT_COMPLETED = "appointment_completed",
  APPOINTMENT_NO_SHOW = "appointment_no_show",
  PAYMENT_RECEIVED = "payment_received",
  REFUND_PROCESSED = "refund_processed",
}

export interface Notification {
  id: string;
  recipientId: string;
  appointmentId: string;
  event: NotificationEvent;
  title: string;
  message: string;
  createdAt: Date;
}

export const NOTIFICATION_TEMPLATES: Record<NotificationEvent, { title: string; message: string }> = {
  [NotificationEvent.APPOINTMENT_BOOKED]: {
    title: "Appointment booked",
    message: "A new appointment has been booked.",
  },
  [NotificationEvent.APPOINTMENT_CONFIRMED]: {
    title: "Appointment confirmed",
    message: "The appointment has been confirmed.",
  },
  [NotificationEvent.APPOINTMENT_RESCHEDULED]: {
    title: "Appointment rescheduled",
    message: "The appointment has been moved to a new time.",
  },
  [NotificationEvent.APPOINTMENT_CANCELLED]: {
    title: "Appointment cancelled",
    message: "The appointment has been cancelled.",
  },
  [NotificationEvent.APPOINTMENT_STARTED]: {
    title: "Consultation started",
    message: "Your consultation has started.",
  },
  [NotificationEvent.APPOINTMENT_COMPLETED]: {
    title: "Consultation completed",
    message: "The consultation has been completed.",
  },
  [NotificationEvent.APPOINTMENT_NO_SHOW]: {
    title: "Missed appointment",
    message: "The appointment was marked as a no-show.",
  },
  [NotificationEvent.PAYMENT_RECEIVED]: {
    title: "Payment received",
    message: "Payment for the appointment has been received.",
  },
  [NotificationEvent.REFUND_PROCESSED]: {
    title: "Refund processed",
    message: "A refund for the cancelled appointment has been issued.",
  },
};
