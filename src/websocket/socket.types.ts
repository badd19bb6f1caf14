import type { Server, Socket } from "socket.io";
import type { AuthenticatedUser } from "@/shared/types/auth.types";
import type { AppointmentEventData, NotificationCreatedEventData } from "@/shared/events/event.types";

export interface JoinRoomResult {
  joined: boolean;
  message?: string;
}

export interface ClientToServerEvents {
  join_appointment: (appointmentId: unknown, ack?: (result: JoinRoomResult) => void) => void;
  leave_appointment: (appointmentId: unknown) => void;
  ping: () => void;
}

export interface ServerToClientEvents {
  new_notification: (notification: NotificationCreatedEventData) => void;
  appointment_updated: (update: AppointmentEventData & { event: string; timestamp: string }) => void;
  pong: (payload: { timestamp: number }) => void;
}

export type InterServerEvents = Record<string, never>;

export interface SocketData {
  user: AuthenticatedUser;
}

export type BookingSocketServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
export type BookingSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export const userRoom = (userId: string): string => `user:${userId}`;
export const appointmentRoom = (appointmentId: string): string => `appointment:${appointmentId}`;
