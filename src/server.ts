import Fastify, { type FastifyError } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import rateLimit from "@fastify/rate-limit";
import helmet from "@fastify/helmet";
import {
  serializerCompiler,
  validatorCompiler,
  jsonSchemaTransform,
} from "fastify-type-provider-zod";
import { env } from "./config/env";
import { AppError } from "./utils/errors";
import { API_PREFIX } from "./config/constants";
import type { FrameExtractionService } from "./modules/frame-extraction";
import type { MediaLibraryService } from "./modules/media-library";
import type { ArchiveBatchService } from "./modules/archive-batch";

export interface ServerDependencies {
  extraction: FrameExtractionService;
  mediaLibrary: MediaLibraryService;
  batch?: ArchiveBatchService;
}

export async function buildServer(overrides: Partial<ServerDependencies> = {}) {
  const fastify = Fastify({
    logger:
      env.NODE_ENV === "development"
        ? {
            level: "debug",
            transport: {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            },
          }
        : {
            level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
          },
    disableRequestLogging: false,
    requestIdHeader: "x-request-id",
  });

  // Set up Zod type provider for schema validation and OpenAPI generation
  fastify.setValidatorCompiler(validatorCompiler);
  fastify.setSerializerCompiler(serializerCompiler);

  await fastify.register(cors, {
    origin: env.NODE_ENV === "development" ? true : ["http://localhost:3000", "http://localhost:5173"],
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  // Security hardening
  await fastify.register(helmet, {
    contentSecurityPolicy: env.NODE_ENV === "production",
    crossOriginResourcePolicy: { policy: "cross-origin" },
    crossOriginEmbedderPolicy: false,
  });

  await fastify.register(rateLimit, {
    max: 100, // 100 requests per minute
    timeWindow: "1 minute",
  });

  // Swagger documentation
  await fastify.register(swagger, {
    transform: jsonSchemaTransform,
    openapi: {
      info: {
        title: "Frame Extractor API",
        description:
          "Samples still frames from a video at a fixed interval with ffmpeg and saves them to the media library.",
        version: "0.1.0",
      },
      servers: [
        {
          url: `http://${env.HOST}:${env.PORT}`,
          description: "Development server",
        },
      ],
      tags: [
        { name: "extractions", description: "Frame extraction" },
        { name: "media", description: "Media library" },
        { name: "archive", description: "Channel archive batch" },
        { name: "system", description: "System health and status" },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      deepLinking: true,
    },
  });

  // Global error handler (must be registered BEFORE routes)
  fastify.setErrorHandler<FastifyError>((error, _request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        success: false,
        error: {
          message: error.message,
          statusCode: error.statusCode,
          ...(error.kind ? { kind: error.kind } : {}),
        },
      });
    }

    // Zod validation errors
    if (error.validation) {
      return reply.status(400).send({
        success: false,
        error: {
          message: "Validation failed",
          statusCode: 400,
          details: error.validation,
        },
      });
    }

    // Log unexpected errors
    fastify.log.error(error);

    // Don't expose internal errors in production
    const message =
      env.NODE_ENV === "development"
        ? error.message || String(error)
        : "Internal server error";

    return reply.status(500).send({
      success: false,
      error: {
        message,
        statusCode: 500,
      },
    });
  });

  // Health check endpoint
  fastify.get("/health", { schema: { tags: ["system"] } }, async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });

  // Register API routes
  await fastify.register(
    async (instance) => {
      const { frameExtractionRoutes } =
        await import("./modules/frame-extraction/frame-extraction.routes");
      const { mediaLibraryRoutes } =
        await import("./modules/media-library/media-library.routes");
      const { archiveBatchRoutes } =
        await import("./modules/archive-batch/archive-batch.routes");

      const extraction =
        overrides.extraction ??
        (await import("./modules/frame-extraction/frame-extraction.service")).getFrameExtractionService();
      const mediaLibrary =
        overrides.mediaLibrary ??
        (await import("./modules/media-library/media-library.service")).getMediaLibraryService();
      const batch =
        overrides.batch ??
        (await import("./modules/archive-batch/archive-batch.service")).getArchiveBatchService();

      await instance.register(frameExtractionRoutes, { prefix: "/extractions", extraction });
      await instance.register(mediaLibraryRoutes, { prefix: "/media", mediaLibrary });
      await instance.register(archiveBatchRoutes, { prefix: "/batch", batch });
    },
    { prefix: API_PREFIX },
  );

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      success: false,
      error: {
        message: "Route not found",
        statusCode: 404,
        path: request.url,
      },
    });
  });

  return fastify;
}
