import config from "@/config";
import { MlflowClient } from "@/clients/mlflow-client";
import { createJobFabric, type JobFabric } from "@/job-fabric";
import { MlflowModelRegistry } from "@/model-registry/mlflow-registry";
import { TritonDeploymentClient } from "@/model-registry/triton-deployments";
import { DeploymentDispatcher } from "./deployment-dispatcher";
import { FleetAggregator } from "./fleet-aggregator";
import { ServerDirectory } from "./server-directory";
import type { MultiModelDeploymentClient } from "./types";

export * from "./deployment-dispatcher";
export * from "./fleet-aggregator";
export * from "./readiness";
export * from "./server-context";
export * from "./server-directory";
export * from "./summaries";
export * from "./tag-codec";
export * from "./types";

export interface InferenceRuntime {
  fabric: JobFabric;
  registry: MlflowModelRegistry;
  directory: ServerDirectory;
  dispatcher: DeploymentDispatcher;
  aggregator: FleetAggregator;
}

/**
 * Wire the orchestrator from configuration. Any collaborator can be replaced.
 */
export function createInferenceRuntime(
  overrides: {
    fabric?: JobFabric;
    registry?: MlflowModelRegistry;
    deploymentClient?: MultiModelDeploymentClient;
  } = {},
): InferenceRuntime {
  const { controller, mlflow, readiness, modelRepository, images } = config;

  const fabric = overrides.fabric ?? createJobFabric();
  const registry =
    overrides.registry ??
    new MlflowModelRegistry({
      client: new MlflowClient({
        trackingUri: mlflow.trackingUri,
        token: mlflow.token,
        timeoutMs: mlflow.requestTimeoutMs,
      }),
      publicUri: mlflow.publicUri,
      descriptorCacheSize: mlflow.descriptorCacheSize,
    });
  const deploymentClient =
    overrides.deploymentClient ??
    new TritonDeploymentClient({
      registry,
      timeoutMs: mlflow.requestTimeoutMs,
    });

  const directory = new ServerDirectory({ fabric, controller, images });
  return {
    fabric,
    registry,
    directory,
    dispatcher: new DeploymentDispatcher({
      fabric,
      directory,
      deploymentClient,
      controller,
      readiness,
      mlflow,
      modelRepository,
    }),
    aggregator: new FleetAggregator({ fabric, directory, deploymentClient }),
  };
}

let runtime: InferenceRuntime | undefined;

/**
 * The process-wide runtime, created on first use
 */
export function getInferenceRuntime(): InferenceRuntime {
  runtime ??= createInferenceRuntime();
  return runtime;
}

export function setInferenceRuntime(value: InferenceRuntime | undefined): void {
  runtime = value;
}
