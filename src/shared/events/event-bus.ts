import { EventEmitter } from "events";
import { createModuleLogger } from "@/shared/config/logger";
import type { MessageBroker } from "@/shared/types/cache.types";
import { generateCorrelationId, generateUUID } from "@/shared/utils/crypto";
import { DomainEvent, domainEventSchema } from "./event.types";

const moduleLogger = createModuleLogger("EventBus");

export interface EventHandler<T = unknown> {
  handle(event: DomainEvent<T>): Promise<void>;
}

export class EventBus extends EventEmitter {
  private readonly handlers: Map<string, EventHandler[]> = new Map();
  private readonly origin = generateUUID();

  constructor(
    private readonly broker?: MessageBroker,
    private readonly channel: string = "domain_events"
  ) {
    super();
    this.setMaxListeners(100);
  }

  // Register event handler
  public registerHandler<T>(eventType: string, handler: EventHandler<T>): void {
    const handlers = this.handlers.get(eventType) ?? [];
    handlers.push(handler);
    this.handlers.set(eventType, handlers);

    moduleLogger.debug({ eventType }, "Handler registered");
  }

  public unregisterHandler<T>(eventType: string, handler: EventHandler<T>): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      const index = handlers.indexOf(handler);
      if (index > -1) {
        handlers.splice(index, 1);
        moduleLogger.debug({ eventType }, "Handler unregistered");
      }
    }
  }

  // Publish domain event locally
  public async publishLocal<T>(event: DomainEvent<T>): Promise<void> {
    const handlers = this.handlers.get(event.type) ?? [];

    // A failing handler does not stop the others
    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler.handle(event);
          moduleLogger.debug({ eventId: event.id, aggregateId: event.aggregateId }, `Handler executed for ${event.type}`);
        } catch (error) {
          moduleLogger.error(
            { error, eventId: event.id, aggregateId: event.aggregateId },
            `Handler failed for ${event.type}`
          );
        }
      })
    );

    // Also emit through EventEmitter for additional listeners
    this.emit(event.type, event);
  }

  // Publish domain event to Redis for other instances
  public async publishDistributed<T>(event: DomainEvent<T>): Promise<void> {
    if (!this.broker) return;

    try {
      await this.broker.publish(this.channel, JSON.stringify(event));

      moduleLogger.debug({ eventId: event.id, aggregateId: event.aggregateId }, `Distributed event published: ${event.type}`);
    } catch (error) {
      moduleLogger.error({ error, eventId: event.id }, "Failed to publish distributed event");
      throw error;
    }
  }

  // Publish both locally and distributed
  public async publish<T>(event: DomainEvent<T>): Promise<void> {
    await this.publishLocal(event);
    await this.publishDistributed(event);
  }

  // Events published by other instances are replayed to local handlers
  public async subscribeToDistributedEvents(): Promise<void> {
    if (!this.broker) return;

    await this.broker.subscribe(this.channel, (message) => {
      this.handleDistributedMessage(message).catch((error: unknown) => {
        moduleLogger.error({ error }, "Failed to handle distributed event");
      });
    });

    moduleLogger.info({ channel: this.channel }, "Subscribed to distributed events");
  }

  private async handleDistributedMessage(message: string): Promise<void> {
    const parsed = domainEventSchema.safeParse(JSON.parse(message));

    if (!parsed.success) {
      moduleLogger.warn({ issues: parsed.error.issues }, "Ignoring malformed distributed event");
      return;
    }

    if (parsed.data.origin === this.origin) return;

    const event: DomainEvent = { ...parsed.data, data: parsed.data.data };
    await this.publishLocal(event);
  }

  // Create domain event
  public createEvent<T>(
    type: string,
    aggregateId: string,
    aggregateType: string,
    data: T,
    version: number = 1,
    userId?: string,
    correlationId?: string
  ): DomainEvent<T> {
    return {
      id: generateUUID(),
      type,
      aggregateId,
      aggregateType,
      data,
      version,
      timestamp: new Date(),
      origin: this.origin,
      userId,
      correlationId: correlationId ?? generateCorrelationId(),
    };
  }
}
