import type { Server as HttpServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import { createModuleLogger, logWebSocketEvent } from "@/shared/config/logger";
import type { EventBus, EventHandler } from "@/shared/events/event-bus";
import { EventTypes } from "@/shared/events/event.types";
import type { AppointmentStore } from "@/domains/appointments/repositories/appointment.repository";
import { createSocketAuthMiddleware, TokenVerifier } from "./middleware/socket-auth.middleware";
import { AppointmentBroadcastHandler, AppointmentSocketHandler } from "./handlers/appointment.handler";
import { NotificationDeliveryHandler } from "./handlers/notification.handler";
import { BookingSocket, BookingSocketServer, userRoom } from "./socket.types";

const moduleLogger = createModuleLogger("WebSocketManager");

const APPOINTMENT_EVENTS = [
  EventTypes.APPOINTMENT_BOOKED,
  EventTypes.APPOINTMENT_CONFIRMED,
  EventTypes.APPOINTMENT_RESCHEDULED,
  EventTypes.APPOINTMENT_CANCELLED,
  EventTypes.APPOINTMENT_STARTED,
  EventTypes.APPOINTMENT_COMPLETED,
  EventTypes.APPOINTMENT_NO_SHOW,
  EventTypes.PAYMENT_RECEIVED,
  EventTypes.REFUND_PROCESSED,
] as const;

export interface WebSocketManagerOptions {
  verifyToken: TokenVerifier;
  appointments: Pick<AppointmentStore, "findById">;
  eventBus: EventBus;
  corsOrigins: string[];
}

export class WebSocketManager {
  private readonly io: BookingSocketServer;
  private readonly subscriptions: Array<[string, EventHandler]> = [];

  constructor(
    httpServer: HttpServer,
    private readonly options: WebSocketManagerOptions
  ) {
    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: options.corsOrigins,
        credentials: true,
      },
      transports: ["websocket", "polling"],
    });

    this.io.use(createSocketAuthMiddleware(options.verifyToken));
    this.setupEventHandlers();
    this.subscribeToDomainEvents();

    moduleLogger.info("WebSocket server initialized");
  }

  private setupEventHandlers(): void {
    this.io.on("connection", (socket: BookingSocket) => {
      const { user } = socket.data;

      // Notifications are addressed to the user's room
      void socket.join(userRoom(user.id));

      logWebSocketEvent("user_connected", { userId: user.id, role: user.role }, socket.id);

      new AppointmentSocketHandler(socket, this.options.appointments).register();

      // Handle ping/pong for connection health
      socket.on("ping", () => {
        socket.emit("pong", { timestamp: Date.now() });
      });

      socket.on("disconnect", (reason) => {
        logWebSocketEvent("user_disconnected", { userId: user.id, reason }, socket.id);
      });

      socket.on("error", (error) => {
        moduleLogger.error({ error, socketId: socket.id }, "Socket error");
      });
    });
  }

  private subscribeToDomainEvents(): void {
    this.subscribe(EventTypes.NOTIFICATION_CREATED, new NotificationDeliveryHandler(this.io));

    const broadcast = new AppointmentBroadcastHandler(this.io);
    for (const eventType of APPOINTMENT_EVENTS) {
      this.subscribe(eventType, broadcast);
    }
  }

  private subscribe(eventType: string, handler: EventHandler): void {
    this.options.eventBus.registerHandler(eventType, handler);
    this.subscriptions.push([eventType, handler]);
  }

  // Close all connections (for graceful shutdown)
  public async close(): Promise<void> {
    for (const [eventType, handler] of this.subscriptions) {
      this.options.eventBus.unregisterHandler(eventType, handler);
    }

    return new Promise((resolve) => {
      this.io.close(() => {
        moduleLogger.info("WebSocket server closed");
        resolve();
      });
    });
  }
}
