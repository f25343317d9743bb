import type { ServerResponse } from "node:http";
import {
  defaultDeploymentName,
  RouteId,
  validateDeploymentName,
} from "@shared";
import type { FastifyPluginAsyncZod } from "fastify-type-provider-zod";
import { getInferenceRuntime, toServerSummary } from "@/inference-runtime";
import {
  ApiError,
  constructResponseSchema,
  DeployMultiModelBodySchema,
  DeployMultiModelResponseSchema,
  DeploySingleModelBodySchema,
  DeploySingleModelResponseSchema,
} from "@/types";

/**
 * Aborts when the client disconnects before the response is written
 */
function abortOnDisconnect(response: ServerResponse): AbortSignal {
  const controller = new AbortController();
  response.on("close", () => {
    if (!response.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

function resolveDeploymentName(
  requested: string | undefined,
  model: { name: string; stage: string },
): string {
  const name = requested ?? defaultDeploymentName(model.name, model.stage);
  const problem = validateDeploymentName(name);
  if (problem) {
    throw new ApiError(400, `Invalid deployment name ${name}: ${problem}`);
  }
  return name;
}

const deploymentRoutes: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    "/api/deployments/single-model",
    {
      schema: {
        operationId: RouteId.DeploySingleModel,
        description:
          "Deploy a registered model on its own inference server and wait until the server starts",
        tags: ["Deployments"],
        body: DeploySingleModelBodySchema,
        response: constructResponseSchema(DeploySingleModelResponseSchema),
      },
    },
    async ({ body }, reply) => {
      const deploymentName = resolveDeploymentName(
        body.deploymentName,
        body.model,
      );
      const { registry, dispatcher } = getInferenceRuntime();
      // Tag the job with the version the registry will actually serve
      const model = await registry.resolveModel(body.model);
      const { server } = await dispatcher.deployService({
        model,
        deploymentName,
        preset: body.preset,
        image: body.image,
        enableAuth: body.enableAuth,
        signal: abortOnDisconnect(reply.raw),
      });
      return reply.send(toServerSummary(server));
    },
  );

  fastify.post(
    "/api/deployments/multi-model",
    {
      schema: {
        operationId: RouteId.DeployMultiModel,
        description:
          "Register a registered model on an existing multi-model server, or on a new one",
        tags: ["Deployments"],
        body: DeployMultiModelBodySchema,
        response: constructResponseSchema(DeployMultiModelResponseSchema),
      },
    },
    async ({ body }, reply) => {
      const { server, deployment } =
        await getInferenceRuntime().dispatcher.deployToMultiModelServer({
          model: body.model,
          deploymentName: resolveDeploymentName(
            body.deploymentName,
            body.model,
          ),
          flavor: body.flavor,
          target: body.target,
          signal: abortOnDisconnect(reply.raw),
        });
      return reply.send({ server: toServerSummary(server), deployment });
    },
  );
};

export default deploymentRoutes;
