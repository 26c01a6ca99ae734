import type { FastifyInstance } from "fastify";
import type { ZodTypeProvider } from "fastify-type-provider-zod";
import { errorResponseSchema } from "@/utils/validation";
import type { MediaLibraryService } from "./media-library.service";
import {
  paginationSchema,
  mediaItemListResponseSchema,
} from "./media-library.schemas";

export type MediaLibraryRoutesOptions = {
  mediaLibrary: MediaLibraryService;
};

export async function mediaLibraryRoutes(
  fastify: FastifyInstance,
  options: MediaLibraryRoutesOptions,
): Promise<void> {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { mediaLibrary } = options;

  // List saved frames, newest first
  app.get(
    "/",
    {
      schema: {
        tags: ["media"],
        summary: "List media library items",
        description: "Returns frames saved to the media library, newest first.",
        querystring: paginationSchema,
        response: {
          200: mediaItemListResponseSchema,
          400: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const page = await mediaLibrary.list(request.query);

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
}
