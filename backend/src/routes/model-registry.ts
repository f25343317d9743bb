import { RouteId } from "@shared";
import type { FastifyPluginAsyncZod } from "fastify-type-provider-zod";
import { z } from "zod";
import { getInferenceRuntime, toRegisteredModel } from "@/inference-runtime";
import { constructResponseSchema, RegisteredModelSchema } from "@/types";

const modelRegistryRoutes: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    "/api/registered-models",
    {
      schema: {
        operationId: RouteId.GetRegisteredModels,
        description:
          "Get the latest Staging and Production versions of every registered model",
        tags: ["Model Registry"],
        response: constructResponseSchema(z.array(RegisteredModelSchema)),
      },
    },
    async (_request, reply) => {
      const models = await getInferenceRuntime().registry.listRegisteredModels();
      return reply.send(models.map(toRegisteredModel));
    },
  );
};

export default modelRegistryRoutes;
