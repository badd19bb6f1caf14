import { z } from "zod";

// Domain event envelope
export interface DomainEvent<T = unknown> {
  id: string;
  type: string;
  aggregateId: string;
  aggregateType: string;
  data: T;
  version: number;
  timestamp: Date;
  origin: string;
  userId?: string | undefined;
  correlationId?: string | undefined;
}

export const domainEventSchema = z.object({
  id: z.string(),
  type: z.string(),
  aggregateId: z.string(),
  aggregateType: z.string(),
  data: z.unknown(),
  version: z.number().int(),
  timestamp: z.coerce.date(),
  origin: z.string(),
  userId: z.string().optional(),
  correlationId: z.string().optional(),
});

// Event types constants
export const EventTypes = {
  // Appointment events
  APPOINTMENT_BOOKED: "appointment.booked",
  APPOINTMENT_CONFIRMED: "appointment.confirmed",
  APPOINTMENT_RESCHEDULED: "appointment.rescheduled",
  APPOINTMENT_CANCELLED: "appointment.cancelled",
  APPOINTMENT_STARTED: "appointment.started",
  APPOINTMENT_COMPLETED: "appointment.completed",
  APPOINTMENT_NO_SHOW: "appointment.no_show",

  // Payment events
  PAYMENT_RECEIVED: "payment.received",
  REFUND_PROCESSED: "payment.refund_processed",

  // Notification events
  NOTIFICATION_CREATED: "notification.created",
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

export interface AppointmentEventData {
  appointmentId: string;
  userId: string;
  doctorId: string;
  status: string;
  startTime: string;
  endTime: string;
}

export interface NotificationCreatedEventData {
  notificationId: string;
  recipientId: string;
  appointmentId: string;
  event: string;
  title: string;
  message: string;
  createdAt: string;
}

export const appointmentEventDataSchema = z.object({
  appointmentId: z.string(),
  userId: z.string(),
  doctorId: z.string(),
  status: z.string(),
  startTime: z.string(),
  endTime: z.string(),
});

export const notificationCreatedEventDataSchema = z.object({
  notificationId: z.string(),
  recipientId: z.string(),
  appointmentId: z.string(),
  event: z.string(),
  title: z.string(),
  message: z.string(),
  createdAt: z.string(),
});
