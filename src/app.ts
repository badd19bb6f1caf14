import express, { Application, Request, Response, NextFunction } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import { config } from "./shared/config/environment";
import { logger, logRequest } from "./shared/config/logger";
import { errorHandler, notFoundHandler } from "./shared/middleware/error.middleware";
import { generateCorrelationId } from "./shared/utils/crypto";
import { ApiResponse } from "./shared/types/common.types";
import { ApiDependencies, createApiRouter } from "./api/v1/routes";
import { createSwaggerSpec } from "./api/swagger/swagger.config";

export interface AppOptions extends ApiDependencies {
  /** Reports the state of backing services for `/health`. */
  healthCheck?: () => Promise<Record<string, boolean>>;
  swaggerEnabled?: boolean;
}

const CORRELATION_ID_PATTERN = /^[\w-]{1,64}$/;

class App {
  public app: Application;

  constructor(private readonly options: AppOptions) {
    this.app = express();
    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeSwagger();
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    // Trust proxy headers (for proper IP detection behind load balancers, or reverse proxy eg. Nginx)
    this.app.set("trust proxy", 1);

    // Security middleware
    this.app.use(
      helmet({
        crossOriginEmbedderPolicy: false, // For Socket.IO compatibility
      })
    );

    // CORS configuration
    this.app.use(
      cors({
        origin: (origin, callback) => {
          // Allow requests with no origin (mobile apps, server-to-server calls)
          if (!origin) return callback(null, true);

          if (config.cors.origins.includes(origin)) {
            return callback(null, true);
          }

          // In development, allow localhost with any port
          if (config.app.isDevelopment && origin.includes("localhost")) {
            return callback(null, true);
          }

          return callback(new Error("Not allowed by CORS"), false);
        },
        credentials: true,
        methods: ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"],
        allowedHeaders: ["Origin", "X-Requested-With", "Content-Type", "Accept", "Authorization", "X-Correlation-ID"],
      })
    );

    // Compression middleware
    this.app.use(compression());

    // Body parsing middleware
    this.app.use(express.json({ limit: "1mb" }));
    this.app.use(express.urlencoded({ extended: true, limit: "1mb" }));

    // Request logging middleware
    if (config.app.isDevelopment) {
      this.app.use(morgan("dev"));
    } else if (!config.app.isTest) {
      this.app.use(
        morgan("combined", {
          stream: {
            write: (message: string) => logger.info(message.trim()),
          },
        })
      );
    }

    // Request correlation ID middleware
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const header = req.get("X-Correlation-ID");
      const correlationId = header && CORRELATION_ID_PATTERN.test(header) ? header : generateCorrelationId();
      req.correlationId = correlationId;
      res.setHeader("X-Correlation-ID", correlationId);
      next();
    });

    // Custom request logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      logRequest(req, res);
      next();
    });

    // Global rate limiting
    this.app.use(this.options.limiters.global);
  }

  private initializeRoutes(): void {
    // Health check endpoint
    this.app.get("/health", (req: Request, res: Response, next: NextFunction) => {
      const check = this.options.healthCheck ?? (async () => ({}));

      check()
        .then((services) => {
          const healthy = Object.values(services).every(Boolean);
          const healthCheck: ApiResponse = {
            success: healthy,
            data: {
              service: config.app.name,
              version: "1.0.0",
              environment: config.app.env,
              timestamp: new Date(),
              uptime: process.uptime(),
              services,
            },
            message: healthy ? "Service is healthy" : "Service is degraded",
          };
          res.status(healthy ? 200 : 503).json(healthCheck);
        })
        .catch(next);
    });

    // API version routing
    this.app.use(`/api/${config.app.apiVersion}`, createApiRouter(this.options));
  }

  private initializeSwagger(): void {
    if (this.options.swaggerEnabled ?? config.swagger.enabled) {
      const swaggerSpec = createSwaggerSpec();

      this.app.use(
        "/docs",
        swaggerUi.serve,
        swaggerUi.setup(swaggerSpec, {
          explorer: true,
          customCss: ".swagger-ui .topbar { display: none }",
          customSiteTitle: `${config.app.name} - API Documentation`,
          swaggerOptions: {
            docExpansion: "none",
            filter: true,
            showRequestDuration: true,
          },
        })
      );

      this.app.get("/docs/swagger.json", (req: Request, res: Response) => {
        res.setHeader("Content-Type", "application/json");
        res.send(swaggerSpec);
      });

      logger.info("Swagger documentation available at /docs");
    }
  }

  private initializeErrorHandling(): void {
    // 404 handler (should be before error handler)
    this.app.use(notFoundHandler);

    // Global error handler
    this.app.use(errorHandler);
  }

  public getApp(): Application {
    return this.app;
  }
}

export default App;
