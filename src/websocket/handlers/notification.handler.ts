import { createModuleLogger, logWebSocketEvent } from "@/shared/config/logger";
import type { EventHandler } from "@/shared/events/event-bus";
import { DomainEvent, notificationCreatedEventDataSchema } from "@/shared/events/event.types";
import { BookingSocketServer, userRoom } from "../socket.types";

const moduleLogger = createModuleLogger("NotificationSocketHandler");

// Delivers in-app notifications to every socket of the recipient
export class NotificationDeliveryHandler implements EventHandler {
  constructor(private readonly io: BookingSocketServer) {}

  async handle(event: DomainEvent): Promise<void> {
    const parsed = notificationCreatedEventDataSchema.safeParse(event.data);
    if (!parsed.success) {
      moduleLogger.warn({ eventId: event.id }, "Ignoring notification event with unexpected data");
      return;
    }

    const notification = parsed.data;
    this.io.to(userRoom(notification.recipientId)).emit("new_notification", notification);

    logWebSocketEvent("notification_sent", {
      notificationId: notification.notificationId,
      recipientId: notification.recipientId,
      event: notification.event,
    });
  }
}
