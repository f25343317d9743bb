import { ENABLED_SERVER_TYPES, InferenceServerType } from "@shared";
import {
  BackendError,
  errorMessage,
  ModelInfoNotFoundError,
  StructuralDecodeError,
} from "@/errors";
import { FabricJobNotFoundError, type JobFabric } from "@/job-fabric";
import logger from "@/logging";
import { metrics } from "@/observability";
import { resolveServerContext } from "./server-context";
import type { ServerDirectory } from "./server-directory";
import { decodeModelIdentity } from "./tag-codec";
import {
  type DeployedModelInfo,
  type InferenceServerInfo,
  type MultiModelDeploymentClient,
  type MultiModelServerInfo,
  type SingleModelServerInfo,
  UNKNOWN_MODEL_VERSION,
} from "./types";

export interface FleetAggregatorOptions {
  fabric: JobFabric;
  directory: ServerDirectory;
  deploymentClient: MultiModelDeploymentClient;
}

const SERVING_TYPES: readonly InferenceServerType[] = ENABLED_SERVER_TYPES.filter(
  (type) => type !== InferenceServerType.None,
);

/**
 * Joins the live fleet of servers with what each of them serves.
 */
export class FleetAggregator {
  constructor(private readonly options: FleetAggregatorOptions) {}

  /**
   * Every model served by an active server of the given (default: all serving) types.
   *
   * @throws ModelInfoNotFoundError when a single-model server lost its model tag
   */
  async listAllDeployedModels(
    types: readonly InferenceServerType[] = SERVING_TYPES,
  ): Promise<DeployedModelInfo[]> {
    const wanted = types.filter((type) => SERVING_TYPES.includes(type));
    const servers = (
      await Promise.all(
        wanted.map((type) => this.options.directory.listActiveServers(type)),
      )
    ).flat();

    const models = await Promise.all(
      servers.map((server) => this.listServedModels(server)),
    );
    return models.flat();
  }

  /**
   * Ask the fabric to stop one of this controller's active servers. Returns
   * once the request is accepted; the server disappears from later listings.
   * Jobs owned by other controllers are reported as missing.
   */
  async killServer({ jobId }: Pick<InferenceServerInfo, "jobId">): Promise<void> {
    const server = await this.options.directory.findActiveServer(jobId);
    if (!server) {
      throw new BackendError(`Server ${jobId} does not exist`, { jobId });
    }

    try {
      await this.options.fabric.killJob(server.jobId);
    } catch (error) {
      if (error instanceof FabricJobNotFoundError) {
        throw new BackendError(
          `Server ${jobId} does not exist`,
          { jobId },
          { cause: error },
        );
      }
      throw new BackendError(
        `Could not stop server ${jobId}: ${errorMessage(error)}`,
        { jobId },
        { cause: error },
      );
    }
    logger.info(
      { jobId, serverName: server.job.name },
      "Requested server termination",
    );
  }

  private async listServedModels(
    server: InferenceServerInfo,
  ): Promise<DeployedModelInfo[]> {
    switch (server.type) {
      case InferenceServerType.SingleModel:
        return [{ model: this.decodeServedModel(server), server }];
      case InferenceServerType.MultiModel:
        return this.listRegisteredModels(server);
      case InferenceServerType.None:
        return [];
    }
  }

  private decodeServedModel(server: SingleModelServerInfo) {
    try {
      return decodeModelIdentity(server.job.tags);
    } catch (error) {
      if (error instanceof ModelInfoNotFoundError) {
        throw new ModelInfoNotFoundError(
          `Server ${server.job.name ?? server.jobId}: ${error.message}`,
          { jobId: server.jobId, deploymentName: server.job.name ?? undefined },
          { cause: error },
        );
      }
      throw error;
    }
  }

  private async listRegisteredModels(
    server: MultiModelServerInfo,
  ): Promise<DeployedModelInfo[]> {
    let context: ReturnType<typeof resolveServerContext>;
    try {
      context = resolveServerContext(server);
    } catch (error) {
      if (!(error instanceof StructuralDecodeError)) {
        throw error;
      }
      logger.warn(
        { jobId: server.jobId, error: error.message },
        "Skipping multi-model server that violates its environment contract",
      );
      metrics.deployments.reportDiscoverySkip("missing_model_repository");
      return [];
    }

    const deployments =
      await this.options.deploymentClient.listDeployments(context);
    // The server does not report versions, only the locator it was deployed from
    return deployments.map((deployment) => ({
      model: {
        name: deployment.name,
        stage: deployment.mlflowModelUri.split("/").pop() ?? "",
        version: UNKNOWN_MODEL_VERSION,
      },
      server,
    }));
  }
}
