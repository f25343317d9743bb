import { RouteId } from "@shared";
import type { FastifyPluginAsyncZod } from "fastify-type-provider-zod";
import { z } from "zod";
import { getInferenceRuntime } from "@/inference-runtime";
import {
  constructResponseSchema,
  ImageTagsQuerySchema,
  ListImagesQuerySchema,
} from "@/types";

const discoveryRoutes: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    "/api/presets",
    {
      schema: {
        operationId: RouteId.GetPresets,
        description: "Get the compute presets jobs can run with",
        tags: ["Discovery"],
        response: constructResponseSchema(z.array(z.string())),
      },
    },
    async (_request, reply) => {
      return reply.send(await getInferenceRuntime().directory.listPresets());
    },
  );

  fastify.get(
    "/api/images",
    {
      schema: {
        operationId: RouteId.GetImages,
        description: "Get the container images inference servers can run",
        tags: ["Discovery"],
        querystring: ListImagesQuerySchema,
        response: constructResponseSchema(z.array(z.string())),
      },
    },
    async ({ query }, reply) => {
      return reply.send(await getInferenceRuntime().directory.listImages(query));
    },
  );

  fastify.get(
    "/api/images/tags",
    {
      schema: {
        operationId: RouteId.GetImageTags,
        description: "Get the tags of a container image, oldest first",
        tags: ["Discovery"],
        querystring: ImageTagsQuerySchema,
        response: constructResponseSchema(z.array(z.string())),
      },
    },
    async ({ query: { image } }, reply) => {
      return reply.send(
        await getInferenceRuntime().directory.listImageTags(image),
      );
    },
  );
};

export default discoveryRoutes;
