import type { FastifyInstance } from "fastify";
import type { ZodTypeProvider } from "fastify-type-provider-zod";
import {
  AppError,
  BadGatewayError,
  ConflictError,
  ForbiddenError,
  ValidationError,
} from "@/utils/errors";
import type { FrameExtractionService } from "./frame-extraction.service";
import type {
  ExtractionOutcome,
  ExtractionSucceeded,
} from "./frame-extraction.types";
import {
  createExtractionSchema,
  extractionResponseSchema,
  extractionStatusResponseSchema,
  errorResponseSchema,
} from "./frame-extraction.schemas";

export type FrameExtractionRoutesOptions = {
  extraction: FrameExtractionService;
};

function outcomeToError(
  outcome: Exclude<ExtractionOutcome, ExtractionSucceeded>,
): AppError {
  switch (outcome.status) {
    case "permission-denied":
      return new ForbiddenError(outcome.message, outcome.status);
    case "busy":
      return new ConflictError(outcome.message, outcome.status);
    case "engine-failed":
      return new BadGatewayError(
        `Frame extraction failed (return code ${outcome.returnCode}): ${outcome.message}`,
        outcome.status,
      );
    case "selection-cancelled":
    case "invalid-source":
    case "invalid-interval":
    case "invalid-destination":
      return new ValidationError(outcome.message, outcome.status);
  }
}

export async function frameExtractionRoutes(
  fastify: FastifyInstance,
  options: FrameExtractionRoutesOptions,
): Promise<void> {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { extraction } = options;

  // Run an extraction
  app.post(
    "/",
    {
      schema: {
        tags: ["extractions"],
        summary: "Extract frames",
        description:
          "Samples one frame every `interval` seconds (default 10) from the source video into the destination directory, then saves every produced frame to the media library.",
        body: createExtractionSchema,
        response: {
          201: extractionResponseSchema,
          400: errorResponseSchema,
          403: errorResponseSchema,
          409: errorResponseSchema,
          502: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const outcome = await extraction.extract(request.body);

      if (outcome.status !== "succeeded") {
        throw outcomeToError(outcome);
      }

      const { status: _status, ...data } = outcome;

      return reply.status(201).send({
        success: true,
        data,
        message: `Extracted ${data.producedFiles.length} frame(s)`,
      });
    },
  );

  // Whether an extraction is currently running
  app.get(
    "/status",
    {
      schema: {
        tags: ["extractions"],
        summary: "Extraction status",
        response: {
          200: extractionStatusResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        success: true,
        data: { busy: extraction.busy },
      });
    },
  );
}
