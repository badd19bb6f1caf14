import { createServer, Server as HttpServer } from "http";
import { config } from "./shared/config/environment";
import { logger } from "./shared/config/logger";
import { DatabaseManager } from "./shared/config/database";
import { RedisManager } from "./shared/config/redis";
import { EventBus } from "./shared/events/event-bus";
import { createAuthenticator } from "./shared/middleware/auth.middleware";
import { createRateLimiters } from "./shared/middleware/rate-limit.middleware";
import { AppointmentRepository } from "./domains/appointments/repositories/appointment.repository";
import { BookingService } from "./domains/appointments/services/booking.service";
import { ConflictCheckerService } from "./domains/appointments/services/conflict-checker.service";
import { ClinicRepository } from "./domains/clinics/repositories/clinic.repository";
import { AvailabilityRepository } from "./domains/doctors/repositories/availability.repository";
import { DoctorRepository } from "./domains/doctors/repositories/doctor.repository";
import { NotificationService } from "./domains/notifications/services/notification.service";
import { HttpPaymentGateway, PaymentGateway } from "./domains/payments/services/payment.gateway";
import App from "./app";
import { WebSocketManager } from "./websocket/socket.manager";

const SHUTDOWN_TIMEOUT_MS = 30_000;

const createPaymentGateway = (): PaymentGateway | undefined => {
  const { keyId, keySecret, baseUrl, checkoutUrl, timeoutMs } = config.payment;

  if (!keyId || !keySecret) {
    logger.warn("Payment gateway credentials are not configured, online payments are disabled");
    return undefined;
  }

  return new HttpPaymentGateway({ baseUrl, keyId, keySecret, checkoutUrl, timeoutMs });
};

class Server {
  private readonly db: DatabaseManager;
  private readonly redis: RedisManager;
  private readonly eventBus: EventBus;
  private readonly app: App;
  private readonly httpServer: HttpServer;
  private readonly webSocketManager: WebSocketManager;
  private shuttingDown = false;

  constructor() {
    this.db = new DatabaseManager(config.database, { verbose: config.app.isDevelopment });
    this.redis = new RedisManager(config.redis);
    this.eventBus = new EventBus(this.redis);

    const availability = new AvailabilityRepository(this.db);
    const appointments = new AppointmentRepository(this.db, this.redis);
    const doctors = new DoctorRepository(this.db, this.redis, availability);
    const clinics = new ClinicRepository(this.db, this.redis);

    const bookingService = new BookingService({
      appointments,
      doctors,
      clinics,
      conflictChecker: new ConflictCheckerService(appointments),
      notifier: new NotificationService(this.eventBus),
      paymentGateway: createPaymentGateway(),
      eventBus: this.eventBus,
      policy: config.booking,
      meetingBaseUrl: config.meeting.baseUrl,
    });

    const auth = createAuthenticator({
      secret: config.jwt.accessSecret,
      issuer: config.jwt.issuer,
      blacklist: this.redis,
    });

    this.app = new App({
      bookingService,
      auth,
      limiters: createRateLimiters(this.redis, config.rateLimit),
      healthCheck: async () => ({
        database: await this.db.ping(),
        redis: await this.redis.ping(),
      }),
    });

    this.httpServer = createServer(this.app.getApp());
    this.webSocketManager = new WebSocketManager(this.httpServer, {
      verifyToken: auth.verifyToken,
      appointments,
      eventBus: this.eventBus,
      corsOrigins: config.websocket.corsOrigins,
    });

    this.setupGracefulShutdown();
  }

  public async start(): Promise<void> {
    await this.db.connect();
    await this.redis.connect();
    await this.eventBus.subscribeToDistributedEvents();

    // Set up server error handling
    this.httpServer.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EACCES") {
        logger.fatal(`Port ${config.app.port} requires elevated privileges`);
      } else if (error.code === "EADDRINUSE") {
        logger.fatal(`Port ${config.app.port} is already in use`);
      } else {
        logger.fatal({ error }, "HTTP server error");
      }
      process.exit(1);
    });

    await new Promise<void>((resolve) => {
      this.httpServer.listen(config.app.port, resolve);
    });

    logger.info(
      {
        name: config.app.name,
        port: config.app.port,
        environment: config.app.env,
        nodeVersion: process.version,
        paymentsEnabled: Boolean(config.payment.keyId && config.payment.keySecret),
      },
      "🚀 Server started successfully!"
    );

    if (config.app.isDevelopment) {
      logger.info(`📖 API Documentation: http://localhost:${config.app.port}/docs`);
      logger.info(`🏥 API Base URL: http://localhost:${config.app.port}/api/${config.app.apiVersion}`);
      logger.info(`⚡ WebSocket Server: ws://localhost:${config.app.port}`);
    }
  }

  private async stop(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info("✅ HTTP server closed");

    await this.webSocketManager.close();
    logger.info("✅ WebSocket server closed");

    await this.db.close();
    await this.redis.close();
  }

  private setupGracefulShutdown(): void {
    const shutdown = (signal: string, exitCode: number = 0): void => {
      if (this.shuttingDown) return;
      this.shuttingDown = true;

      logger.info(`📴 Received ${signal}. Starting graceful shutdown...`);

      // Force shutdown when connections do not drain in time
      setTimeout(() => {
        logger.error("⏰ Graceful shutdown timeout, forcing exit");
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();

      this.stop()
        .then(() => {
          logger.info("👋 Graceful shutdown completed");
          process.exit(exitCode);
        })
        .catch((error: unknown) => {
          logger.error({ error }, "❌ Error during graceful shutdown");
          process.exit(1);
        });
    };

    // Handle process termination signals
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    process.on("uncaughtException", (error) => {
      logger.fatal({ error }, "💥 Uncaught Exception");
      shutdown("uncaughtException", 1);
    });

    process.on("unhandledRejection", (reason) => {
      logger.fatal({ reason }, "💥 Unhandled Rejection");
      shutdown("unhandledRejection", 1);
    });
  }
}

// Start the server if this file is executed directly
if (require.main === module) {
  const server = new Server();
  server.start().catch((error: unknown) => {
    logger.fatal({ error }, "Failed to start application");
    process.exit(1);
  });
}

export default Server;
