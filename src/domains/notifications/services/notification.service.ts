import { createModuleLogger } from "@/shared/config/logger";
import type { EventBus } from "@/shared/events/event-bus";
import { EventTypes, NotificationCreatedEventData } from "@/shared/events/event.types";
import { generateUUID } from "@/shared/utils/crypto";
import { NOTIFICATION_TEMPLATES, Notification, NotificationEvent } from "../models/notification.model";

const moduleLogger = createModuleLogger("NotificationService");

export interface Notifier {
  /** Fire-and-forget: delivery problems are logged, never thrown. */
  notify(event: NotificationEvent, appointmentId: string, recipientId: string): void;
}

export class NotificationService implements Notifier {
  constructor(
    private readonly eventBus: EventBus,
    private readonly now: () => Date = () => new Date()
  ) {}

  notify(event: NotificationEvent, appointmentId: string, recipientId: string): void {
    let notification: Notification;
    try {
      notification = this.build(event, appointmentId, recipientId);
    } catch (error) {
      moduleLogger.error({ error, event, appointmentId, recipientId }, "Failed to build notification");
      return;
    }

    this.deliver(notification).catch((error: unknown) => {
      moduleLogger.error(
        { error, notificationId: notification.id, event, appointmentId, recipientId },
        "Failed to deliver notification"
      );
    });
  }

  build(event: NotificationEvent, appointmentId: string, recipientId: string): Notification {
    const template = NOTIFICATION_TEMPLATES[event];

    return {
      id: generateUUID(),
      recipientId,
      appointmentId,
      event,
      title: template.title,
      message: template.message,
      createdAt: this.now(),
    };
  }

  private async deliver(notification: Notification): Promise<void> {
    const data: NotificationCreatedEventData = {
      notificationId: notification.id,
      recipientId: notification.recipientId,
      appointmentId: notification.appointmentId,
      event: notification.event,
      title: notification.title,
      message: notification.message,
      createdAt: notification.createdAt.toISOString(),
    };

    const domainEvent = this.eventBus.createEvent(
      EventTypes.NOTIFICATION_CREATED,
      notification.id,
      "notification",
      data,
      1,
      notification.recipientId
    );

    await this.eventBus.publish(domainEvent);

    moduleLogger.debug(
      { notificationId: notification.id, event: notification.event, recipientId: notification.recipientId },
      "Notification published"
    );
  }
}
