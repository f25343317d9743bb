const isMainModule =
  process.argv[1]?.includes("server.mjs") ||
  process.argv[1]?.includes("server.ts") ||
  process.argv[1]?.endsWith("/server");

import fastifyCors from "@fastify/cors";
import fastifySwagger from "@fastify/swagger";
import Fastify from "fastify";
import metricsPlugin from "fastify-metrics";
import {
  hasZodFastifySchemaValidationErrors,
  isResponseSerializationError,
  jsonSchemaTransform,
  jsonSchemaTransformObject,
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import { z } from "zod";
import config from "@/config";
import { isDeploymentError } from "@/errors";
import { getInferenceRuntime } from "@/inference-runtime";
import logger from "@/logging";
import { metrics } from "@/observability";
import { ApiError, toApiError } from "@/types";
import * as routes from "./routes";

const {
  api: { port, name, version, host, corsOrigins },
  observability,
} = config;

/** Type for the Fastify instance with Zod type provider */
export type FastifyInstanceWithZod = ReturnType<typeof createFastifyInstance>;

export async function registerSwaggerPlugin(fastify: FastifyInstanceWithZod) {
  await fastify.register(fastifySwagger, {
    openapi: {
      openapi: "3.0.0",
      info: {
        title: name,
        version,
      },
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
    transformObject: jsonSchemaTransformObject,
  });
}

/**
 * Register the health endpoint on a Fastify instance.
 * This is a lightweight endpoint for liveness checks - it only verifies the HTTP server is running.
 */
export function registerHealthEndpoint(fastify: FastifyInstanceWithZod) {
  fastify.get(
    "/health",
    {
      schema: {
        tags: ["health"],
        response: {
          200: z.object({
            name: z.string(),
            status: z.string(),
            version: z.string(),
          }),
        },
      },
    },
    async () => ({
      name,
      status: "ok",
      version,
    }),
  );
}

/**
 * Register all API routes on a Fastify instance.
 */
export async function registerApiRoutes(fastify: FastifyInstanceWithZod) {
  for (const route of Object.values(routes)) {
    await fastify.register(route);
  }
}

/**
 * Sets up logging and zod type provider + request validation & response serialization
 */
export const createFastifyInstance = () =>
  Fastify({
    loggerInstance: logger,
    disableRequestLogging: true,
  })
    .withTypeProvider<ZodTypeProvider>()
    .setValidatorCompiler(validatorCompiler)
    .setSerializerCompiler(serializerCompiler)
    // https://fastify.dev/docs/latest/Reference/Server/#seterrorhandler
    .setErrorHandler<ApiError | Error>(function (error, _request, reply) {
      // Handle response serialization errors (when response doesn't match schema)
      if (isResponseSerializationError(error)) {
        const issues = error.cause?.issues ?? [];
        this.log.error(
          {
            statusCode: 500,
            method: error.method,
            url: error.url,
            validationErrors: issues.map((issue) => ({
              path: issue.path?.join("."),
              code: issue.code,
              message: issue.message,
            })),
          },
          "Response serialization error: response doesn't match schema",
        );

        return reply.status(500).send({
          error: {
            message: "Response doesn't match the schema",
            type: "api_internal_server_error",
          },
        });
      }

      // Handle Zod validation errors (from fastify-type-provider-zod)
      if (hasZodFastifySchemaValidationErrors(error)) {
        const message = error.message || "Validation error";
        this.log.info(
          { error: message, statusCode: 400 },
          "HTTP 400 validation error occurred",
        );

        return reply.status(400).send({
          error: {
            message,
            type: "api_validation_error",
          },
        });
      }

      // Deployment failures carry their own status
      const apiError = isDeploymentError(error) ? toApiError(error) : error;
      const errorContext = isDeploymentError(error) ? error.logContext : {};

      if (apiError instanceof ApiError) {
        const { statusCode, message, type } = apiError;

        if (statusCode >= 500) {
          this.log.error(
            { error: message, statusCode, ...errorContext },
            "HTTP 50x request error occurred",
          );
        } else {
          this.log.info(
            { error: message, statusCode, ...errorContext },
            "HTTP 40x request error occurred",
          );
        }

        return reply.status(statusCode).send({
          error: {
            message,
            type,
          },
        });
      }

      // Handle standard Error objects
      const message = apiError.message || "Internal server error";
      const statusCode = 500;

      this.log.error(
        { error: message, statusCode },
        "HTTP 50x request error occurred",
      );

      return reply.status(statusCode).send({
        error: {
          message,
          type: "api_internal_server_error",
        },
      });
    });

const registerMetricsPlugin = async (
  fastify: FastifyInstanceWithZod,
): Promise<void> => {
  await fastify.register(metricsPlugin, {
    endpoint: observability.metrics.endpoint,
    defaultMetrics: { enabled: true },
    routeMetrics: {
      enabled: true,
      methodBlacklist: ["OPTIONS", "HEAD"],
      routeBlacklist: ["/health", observability.metrics.endpoint],
    },
  });
  metrics.deployments.initializeDeploymentMetrics();
};

const start = async () => {
  const fastify = createFastifyInstance();

  const shouldSkipRequestLogging = (url: string): boolean =>
    url === "/health" || url === observability.metrics.endpoint;

  fastify.addHook("onRequest", (request, _reply, done) => {
    if (!shouldSkipRequestLogging(request.url)) {
      request.log.info(
        { url: request.url, method: request.method },
        "incoming request",
      );
    }
    done();
  });

  fastify.addHook("onResponse", (request, reply, done) => {
    if (!shouldSkipRequestLogging(request.url)) {
      request.log.info(
        {
          url: request.url,
          method: request.method,
          statusCode: reply.statusCode,
          responseTime: reply.elapsedTime,
        },
        "request completed",
      );
    }
    done();
  });

  try {
    // Fail fast on an unusable cluster configuration
    getInferenceRuntime();

    await registerMetricsPlugin(fastify);

    await fastify.register(fastifyCors, {
      origin: corsOrigins,
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      credentials: true,
    });
    logger.info(
      {
        corsOrigins: corsOrigins.map((o) =>
          o instanceof RegExp ? o.toString() : o,
        ),
      },
      "CORS origins configured",
    );

    /**
     * @fastify/swagger must be registered before any routes to ensure proper route discovery
     */
    await registerSwaggerPlugin(fastify);

    fastify.get("/openapi.json", async () => fastify.swagger());
    registerHealthEndpoint(fastify);
    await registerApiRoutes(fastify);

    await fastify.listen({ port, host });
    fastify.log.info(`${name} started on port ${port}`);

    const gracefulShutdown = async (signal: string) => {
      fastify.log.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await fastify.close();
        fastify.log.info("Server closed");
        process.exit(0);
      } catch (error) {
        fastify.log.error({ error }, "Error during shutdown");
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

/**
 * Only start the server if this file is being run directly (not imported)
 */
if (isMainModule) {
  void start();
}
