import path from "path";
import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import swaggerJsdoc from "swagger-jsdoc";
import swaggerUi from "swagger-ui-express";
import type { AppConfig } from "./lib/config";
import { createIpRoutes } from "./routes/ips.routes";
import { createExtractionRoutes } from "./routes/extraction.routes";
import type { ExtractionScheduler } from "./services/extractionScheduler";
import { openResultStore, type StoreFactory } from "./services/resultStore";

export interface AppDeps {
  config: AppConfig;
  scheduler: ExtractionScheduler;
  openStore?: StoreFactory;
}

export function createApp({ config, scheduler, openStore = openResultStore }: AppDeps): Express {
  const app: Express = express();

  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
    })
  );
  app.use(express.json());

  const swaggerSpec = swaggerJsdoc({
    definition: {
      openapi: "3.0.0",
      info: {
        title: "IP Harvester API",
        version: "1.0.0",
        description: "Private and public IPv4 addresses extracted from the access log",
      },
      servers: [
        {
          url: `http://localhost:${config.port}`,
          description: "Development server",
        },
      ],
      components: {
        schemas: {
          IpList: {
            type: "object",
            properties: {
              ips: { type: "array", items: { type: "string", example: "10.0.0.5" } },
              total: { type: "number" },
            },
            required: ["ips", "total"],
          },
          RunSummary: {
            type: "object",
            properties: {
              status: { type: "string", enum: ["succeeded", "failed"] },
              filePath: { type: "string" },
              startedAt: { type: "string", format: "date-time" },
              finishedAt: { type: "string", format: "date-time" },
              durationMs: { type: "number" },
              privateCount: { type: "number" },
              publicCount: { type: "number" },
              error: { type: "string" },
            },
          },
          Error: {
            type: "object",
            properties: {
              error: { type: "string", description: "Error message" },
            },
          },
        },
      },
    },
    apis: [path.join(__dirname, "routes", "*.{ts,js}"), __filename],
  });

  app.use(
    "/docs",
    swaggerUi.serve,
    swaggerUi.setup(swaggerSpec, {
      customCss: ".swagger-ui .topbar { display: none }",
      customSiteTitle: "IP Harvester API Documentation",
    })
  );

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check endpoint
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Server is healthy
   */
  app.get("/health", (req: Request, res: Response) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/api/ips", createIpRoutes(config, openStore));
  app.use("/api/extraction", createExtractionRoutes(scheduler));

  app.get("/", (req: Request, res: Response) => {
    res.json({
      message: "IP Harvester API",
      version: "1.0.0",
      docs: "/docs",
    });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      message: "Route not found",
      path: req.path,
    });
  });

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error(err.stack);
    res.status(500).json({
      message: "Internal server error",
      error: config.nodeEnv === "development" ? err.message : undefined,
    });
  });

  return app;
}
