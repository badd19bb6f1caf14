import { z } from "zod";
import { createModuleLogger, logWebSocketEvent } from "@/shared/config/logger";
import type { EventHandler } from "@/shared/events/event-bus";
import { appointmentEventDataSchema, DomainEvent } from "@/shared/events/event.types";
import { canAccessAppointment } from "@/domains/appointments/services/access-policy";
import type { AppointmentStore } from "@/domains/appointments/repositories/appointment.repository";
import { appointmentRoom, BookingSocket, BookingSocketServer, JoinRoomResult } from "../socket.types";

const moduleLogger = createModuleLogger("AppointmentSocketHandler");

const appointmentIdSchema = z.string().uuid();

/** Room membership for appointment participants. */
export class AppointmentSocketHandler {
  constructor(
    private readonly socket: BookingSocket,
    private readonly appointments: Pick<AppointmentStore, "findById">
  ) {}

  register(): void {
    this.socket.on("join_appointment", (appointmentId, ack) => {
      this.handleJoin(appointmentId)
        .then((result) => ack?.(result))
        .catch((error: unknown) => {
          moduleLogger.error({ error, socketId: this.socket.id }, "Failed to join appointment room");
          ack?.({ joined: false, message: "Unable to join the appointment right now" });
        });
    });

    this.socket.on("leave_appointment", (appointmentId) => {
      const parsed = appointmentIdSchema.safeParse(appointmentId);
      if (!parsed.success) return;

      void this.socket.leave(appointmentRoom(parsed.data));
      logWebSocketEvent("left_appointment_room", { appointmentId: parsed.data }, this.socket.id);
    });
  }

  handleJoin(appointmentId: unknown): Promise<JoinRoomResult> {
    return joinAppointmentRoom(this.socket, this.appointments, appointmentId);
  }
}

/** The parts of a socket that room membership needs. */
export type AppointmentRoomMember = Pick<BookingSocket, "id" | "data" | "join">;

export const joinAppointmentRoom = async (
  socket: AppointmentRoomMember,
  appointments: Pick<AppointmentStore, "findById">,
  appointmentId: unknown
): Promise<JoinRoomResult> => {
  const parsed = appointmentIdSchema.safeParse(appointmentId);
  if (!parsed.success) {
    return { joined: false, message: "Invalid appointment id" };
  }

  const appointment = await appointments.findById(parsed.data);
  if (!appointment || appointment.isDeleted) {
    return { joined: false, message: "Appointment not found" };
  }

  const { user } = socket.data;
  if (!canAccessAppointment(user, appointment)) {
    logWebSocketEvent("appointment_room_denied", { appointmentId: parsed.data, userId: user.id }, socket.id);
    return { joined: false, message: "You do not have access to this appointment" };
  }

  await socket.join(appointmentRoom(parsed.data));
  logWebSocketEvent("joined_appointment_room", { appointmentId: parsed.data }, socket.id);

  return { joined: true };
};

/** Pushes appointment lifecycle events to everyone in the appointment's room. */
export class AppointmentBroadcastHandler implements EventHandler {
  constructor(private readonly io: BookingSocketServer) {}

  async handle(event: DomainEvent): Promise<void> {
    const parsed = appointmentEventDataSchema.safeParse(event.data);
    if (!parsed.success) {
      moduleLogger.warn({ eventId: event.id, eventType: event.type }, "Ignoring appointment event with unexpected data");
      return;
    }

    this.io.to(appointmentRoom(parsed.data.appointmentId)).emit("appointment_updated", {
      ...parsed.data,
      event: event.type,
      timestamp: event.timestamp.toISOString(),
    });
  }
}
