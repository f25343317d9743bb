import fs from "node:fs/promises";
import { PreconditionViolationError, StructuralDecodeError } from "@/errors";
import type { MultiModelServerContext, MultiModelServerInfo } from "./types";

/** Job environment variable holding the server's model repository path */
export const MODEL_REPOSITORY_ENV = "TRITON_MODEL_REPO";

/**
 * Resolve the management endpoint and shared repository path of a multi-model server.
 * Pure: fails with a structural error before anything touches the network or disk.
 */
export function resolveServerContext(
  server: MultiModelServerInfo,
): MultiModelServerContext {
  const { job } = server;
  const errorContext = { jobId: job.id, deploymentName: job.name ?? undefined };

  const modelRepositoryPath = job.container.env[MODEL_REPOSITORY_ENV];
  if (!modelRepositoryPath) {
    throw new StructuralDecodeError(
      `Server ${job.name ?? job.id} does not define ${MODEL_REPOSITORY_ENV}`,
      errorContext,
    );
  }
  if (!job.internalHostname || job.container.httpPort === undefined) {
    throw new StructuralDecodeError(
      `Server ${job.name ?? job.id} exposes no management endpoint`,
      errorContext,
    );
  }

  return {
    serverJobId: job.id,
    managementUrl: `http://${job.internalHostname}:${job.container.httpPort}`,
    modelRepositoryPath,
  };
}

/**
 * Run `action` against one multi-model server.
 *
 * The repository path must already exist here: it is the same shared volume the
 * server mounts, and nothing else can deliver model files to it.
 */
export async function withServerContext<T>(
  server: MultiModelServerInfo,
  action: (context: MultiModelServerContext) => Promise<T>,
): Promise<T> {
  const context = resolveServerContext(server);

  const exists = await fs
    .stat(context.modelRepositoryPath)
    .then((stats) => stats.isDirectory())
    .catch(() => false);
  if (!exists) {
    throw new PreconditionViolationError(
      `Model repository ${context.modelRepositoryPath} is not mounted`,
      { jobId: server.jobId, deploymentName: server.job.name ?? undefined },
    );
  }

  return action(context);
}
