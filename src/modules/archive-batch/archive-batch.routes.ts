import type { FastifyInstance } from "fastify";
import type { ZodTypeProvider } from "fastify-type-provider-zod";
import type { ArchiveBatchService } from "./archive-batch.service";
import {
  archiveBatchRunResponseSchema,
  archiveBatchStatusResponseSchema,
  errorResponseSchema,
  paginationSchema,
  processedVideoListResponseSchema,
} from "./archive-batch.schemas";

export type ArchiveBatchRoutesOptions = {
  batch: ArchiveBatchService;
};

export async function archiveBatchRoutes(
  fastify: FastifyInstance,
  options: ArchiveBatchRoutesOptions,
): Promise<void> {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { batch } = options;

  // Process the channel's new archive videos
  app.post(
    "/runs",
    {
      schema: {
        tags: ["archive"],
        summary: "Run the archive batch",
        description:
          "Lists the channel's recent archive videos, skips those already processed, then downloads each new one, extracts its frames into a folder named after the video and records it.",
        response: {
          200: archiveBatchRunResponseSchema,
          404: errorResponseSchema,
          409: errorResponseSchema,
          502: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const report = await batch.run();

      return reply.send({
        success: true,
        data: report,
        message: `Processed ${report.processedCount} of ${report.results.length} new video(s)`,
      });
    },
  );

  // Videos already in the ledger, most recent first
  app.get(
    "/processed",
    {
      schema: {
        tags: ["archive"],
        summary: "List processed archive videos",
        querystring: paginationSchema,
        response: {
          200: processedVideoListResponseSchema,
          400: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const page = await batch.listProcessed(request.query);

      return reply.send({
        success: true,
        data: page.items,
        pagination: {
          page: page.page,
          limit: page.limit,
          total: page.total,
        },
      });
    },
  );

  app.get(
    "/status",
    {
      schema: {
        tags: ["archive"],
        summary: "Archive batch status",
        response: {
          200: archiveBatchStatusResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        success: true,
        data: { running: batch.busy },
      });
    },
  );
}
