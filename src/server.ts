import { createServer, Server as HttpServer } from "http";
import { config } from "./shared/config/environment";
import { logger } from "./shared/config/logger";
import { db } from "./shared/config/database";
import { RedisManager } from "./shared/config/redis";
import App from "./app";
import { Container, createContainer } from "./container";

const SHUTDOWN_TIMEOUT_MS = 30000;

class Server {
  private app: App;
  private container: Container;
  private httpServer: HttpServer;
  private shuttingDown = false;

  constructor() {
    this.container = createContainer();
    this.app = new App(this.container);
    this.httpServer = createServer(this.app.getApp());

    this.setupGracefulShutdown();
  }

  public async start(): Promise<void> {
    if (this.container.databaseProvider === "mysql") {
      await db.connect();
    }

    if (this.container.broker instanceof RedisManager) {
      await this.container.broker.connect();
    }

    await this.container.identityConsumer.start();

    this.httpServer.listen(config.app.port, () => {
      logger.info(
        {
          name: config.app.name,
          port: config.app.port,
          environment: config.app.env,
          databaseProvider: this.container.databaseProvider,
          nodeVersion: process.version,
        },
        "Server started successfully"
      );

      if (config.app.isDevelopment) {
        logger.info(`API Documentation: http://localhost:${config.app.port}/docs`);
        logger.info(`API Base URL: http://localhost:${config.app.port}/api/${config.app.apiVersion}`);
      }
    });

    this.httpServer.on("error", (error: NodeJS.ErrnoException) => {
      if (error.syscall !== "listen") {
        throw error;
      }

      const bind = `Port ${config.app.port}`;

      switch (error.code) {
        case "EACCES":
          logger.error(`${bind} requires elevated privileges`);
          process.exit(1);
          break;
        case "EADDRINUSE":
          logger.error(`${bind} is already in use`);
          process.exit(1);
          break;
        default:
          throw error;
      }
    });

    this.logStartupMetrics();
  }

  private logStartupMetrics(): void {
    const memoryUsage = process.memoryUsage();

    logger.info(
      {
        memory: {
          rss: `${Math.round(memoryUsage.rss / 1024 / 1024)} MB`,
          heapUsed: `${Math.round(memoryUsage.heapUsed / 1024 / 1024)} MB`,
        },
        startupTime: `${process.uptime().toFixed(2)}s`,
        pid: process.pid,
      },
      "Startup metrics"
    );
  }

  private async releaseResources(): Promise<void> {
    await this.container.identityConsumer.stop();
    logger.info("Identity event consumer stopped");

    await this.container.broker.close();
    logger.info("Message broker closed");

    if (this.container.databaseProvider === "mysql") {
      await db.close();
      logger.info("Database connections closed");
    }
  }

  private setupGracefulShutdown(): void {
    const shutdown = (signal: string): void => {
      if (this.shuttingDown) return;
      this.shuttingDown = true;

      logger.info(`Received ${signal}. Starting graceful shutdown...`);

      this.httpServer.close(() => {
        logger.info("HTTP server closed");

        this.releaseResources()
          .then(() => {
            logger.info("Graceful shutdown completed");
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, "Error during graceful shutdown");
            process.exit(1);
          });
      });

      setTimeout(() => {
        logger.error("Graceful shutdown timeout, forcing exit");
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    process.on("uncaughtException", (error) => {
      logger.fatal({ err: error }, "Uncaught exception");
      shutdown("uncaughtException");
    });

    process.on("unhandledRejection", (reason) => {
      logger.fatal({ err: reason }, "Unhandled rejection");
      shutdown("unhandledRejection");
    });
  }

  public getApp(): App {
    return this.app;
  }

  public getHttpServer(): HttpServer {
    return this.httpServer;
  }
}

// Start the server if this file is executed directly
if (require.main === module) {
  const server = new Server();
  server.start().catch((error: unknown) => {
    logger.fatal({ err: error }, "Failed to start application");
    process.exit(1);
  });
}

export default Server;
