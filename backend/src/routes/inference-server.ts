import { RouteId } from "@shared";
import type { FastifyPluginAsyncZod } from "fastify-type-provider-zod";
import { z } from "zod";
import {
  getInferenceRuntime,
  toDeployedModelSummary,
  toServerSummary,
} from "@/inference-runtime";
import {
  constructResponseSchema,
  DeleteObjectResponseSchema,
  DeployedModelSummarySchema,
  InferenceServerSummarySchema,
  ServerTypeQuerySchema,
} from "@/types";

const inferenceServerRoutes: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    "/api/inference-servers",
    {
      schema: {
        operationId: RouteId.GetInferenceServers,
        description: "Get the active inference servers, optionally of one type",
        tags: ["Inference Servers"],
        querystring: ServerTypeQuerySchema,
        response: constructResponseSchema(z.array(InferenceServerSummarySchema)),
      },
    },
    async ({ query: { type } }, reply) => {
      const servers =
        await getInferenceRuntime().directory.listActiveServers(type);
      return reply.send(servers.map(toServerSummary));
    },
  );

  fastify.delete(
    "/api/inference-servers/:jobId",
    {
      schema: {
        operationId: RouteId.DeleteInferenceServer,
        description:
          "Stop an inference server. The server disappears from later listings.",
        tags: ["Inference Servers"],
        params: z.object({
          jobId: z.string().min(1),
        }),
        response: constructResponseSchema(DeleteObjectResponseSchema),
      },
    },
    async ({ params: { jobId } }, reply) => {
      await getInferenceRuntime().aggregator.killServer({ jobId });
      return reply.send({ success: true });
    },
  );

  fastify.get(
    "/api/deployed-models",
    {
      schema: {
        operationId: RouteId.GetDeployedModels,
        description: "Get every model served by an active inference server",
        tags: ["Inference Servers"],
        querystring: ServerTypeQuerySchema,
        response: constructResponseSchema(z.array(DeployedModelSummarySchema)),
      },
    },
    async ({ query: { type } }, reply) => {
      const models = await getInferenceRuntime().aggregator.listAllDeployedModels(
        type ? [type] : undefined,
      );
      return reply.send(models.map(toDeployedModelSummary));
    },
  );
};

export default inferenceServerRoutes;
