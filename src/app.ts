import express, { Application, Request, Response, NextFunction } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import swaggerUi from "swagger-ui-express";
import { config } from "./shared/config/environment";
import { logger, logRequest } from "./shared/config/logger";
import type { ApiResponse } from "./shared/types/common.types";
import { errorHandler, notFoundHandler } from "./shared/middleware/error.middleware";
import { generateCorrelationId } from "./shared/utils/crypto";
import { sendHealthCheck } from "./shared/utils/response";
import { createSwaggerSpec } from "./api/swagger/swagger.config";
import { createApiRoutes } from "./api/v1/routes";
import { Container, createContainer } from "./container";
import "./shared/types/express.types";

const APP_VERSION = "1.0.0";

class App {
  public app: Application;

  constructor(private readonly container: Container = createContainer()) {
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
    this.app.use(helmet());

    // CORS configuration
    this.app.use(
      cors({
        origin: (origin, callback) => {
          // Allow requests with no origin (mobile apps, Postman, etc.)
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
        exposedHeaders: ["X-Correlation-ID"],
      })
    );

    // Compression middleware
    this.app.use(compression());

    // Body parsing middleware
    this.app.use(express.json({ limit: "1mb" }));
    this.app.use(express.urlencoded({ extended: true, limit: "1mb" }));

    // Request correlation ID middleware
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const header = req.get("X-Correlation-ID");
      const correlationId = header && header.trim() !== "" ? header : generateCorrelationId();
      req.correlationId = correlationId;
      res.setHeader("X-Correlation-ID", correlationId);
      next();
    });

    // Request logging middleware
    if (!config.app.isTest) {
      if (config.app.isDevelopment) {
        this.app.use(morgan("dev"));
      } else {
        this.app.use(
          morgan("combined", {
            stream: {
              write: (message: string) => logger.info(message.trim()),
            },
          })
        );
      }
    }

    // Custom request logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      logRequest(req, res);
      next();
    });

    // Global rate limiting
    const globalRateLimit = rateLimit({
      windowMs: config.rateLimit.windowMs,
      max: config.rateLimit.maxRequests * 2, // More generous for global limit
      message: {
        success: false,
        message: "Too many requests from this IP, please try again later",
        code: "RATE_LIMIT_EXCEEDED",
      } satisfies ApiResponse,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => config.app.isTest || req.path.startsWith("/health"),
    });

    this.app.use(globalRateLimit);
  }

  private initializeRoutes(): void {
    // Health check endpoint
    this.app.get("/health", (req: Request, res: Response) => {
      sendHealthCheck(res, {
        service: config.app.name,
        version: APP_VERSION,
        environment: config.app.env,
        timestamp: new Date(),
        uptime: process.uptime(),
        databaseProvider: this.container.databaseProvider,
      });
    });

    this.app.use(`/api/${config.app.apiVersion}`, createApiRoutes(this.container));
  }

  private initializeSwagger(): void {
    if (config.swagger.enabled) {
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

  public getContainer(): Container {
    return this.container;
  }
}

export default App;
