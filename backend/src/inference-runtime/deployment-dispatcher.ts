import fs from "node:fs/promises";
import { InferenceServerType } from "@shared";
import {
  BackendError,
  DeploymentCancelledError,
  DeploymentMismatchError,
  errorMessage,
  isDeploymentError,
  NameCollisionError,
  PreconditionViolationError,
  ServerResolutionError,
  SubmissionError,
} from "@/errors";
import {
  FabricNameConflictError,
  type JobDescription,
  type JobFabric,
  type JobSubmission,
  type JobVolumeMount,
} from "@/job-fabric";
import logger from "@/logging";
import { metrics } from "@/observability";
import type { DeploymentBackend } from "@/observability/metrics/deployments";
import { waitForJobReady } from "./readiness";
import { MODEL_REPOSITORY_ENV, withServerContext } from "./server-context";
import type { ServerDirectory } from "./server-directory";
import { type ControllerIdentity, encodeServerTags } from "./tag-codec";
import {
  type CreatedDeployment,
  type ModelInfo,
  modelLocator,
  type MultiModelDeploymentClient,
  type MultiModelServerInfo,
  type SingleModelServerInfo,
} from "./types";

const SINGLE_MODEL_PORT = 5000;
const MODEL_REPOSITORY_STORAGE_ENV = "TRITON_MODEL_REPO_STORAGE";
const MULTI_MODEL_PORT = 8000;

export interface DeploymentDispatcherOptions {
  fabric: JobFabric;
  directory: ServerDirectory;
  deploymentClient: MultiModelDeploymentClient;
  controller: ControllerIdentity;
  readiness: { timeoutMs: number; intervalMs: number };
  mlflow: {
    trackingUri: string;
    tokenSecret: { name: string; key: string };
  };
  modelRepository: {
    /** Where the shared repository is mounted in this process and in servers */
    mountPath?: string;
    storage: { claimName: string; subPath?: string } | null;
  };
}

export interface DeployServiceRequest {
  model: ModelInfo;
  deploymentName: string;
  preset: string;
  image: string;
  enableAuth: boolean;
  signal?: AbortSignal;
}

export interface DeployServerRequest {
  serverName: string;
  preset: string;
  image: string;
  enableAuth: boolean;
  signal?: AbortSignal;
}

export interface DeployModelRequest {
  server: MultiModelServerInfo;
  model: ModelInfo;
  deploymentName: string;
  flavor: string;
  signal?: AbortSignal;
}

export type MultiModelTarget =
  | { type: "existing"; serverJobId: string }
  | {
      type: "new";
      serverName: string;
      preset: string;
      image: string;
      enableAuth: boolean;
    };

export interface DeployToMultiModelServerRequest {
  model: ModelInfo;
  deploymentName: string;
  flavor: string;
  target: MultiModelTarget;
  signal?: AbortSignal;
}

/**
 * Turns deployment requests into fabric jobs and model registrations.
 *
 * Every deployment is submitted at most once: failures are reported to the
 * caller and never retried.
 */
export class DeploymentDispatcher {
  constructor(private readonly options: DeploymentDispatcherOptions) {}

  /**
   * Start a single-model server bound to `model` and wait until it leaves pending.
   */
  async deployService({
    model,
    deploymentName,
    preset,
    image,
    enableAuth,
    signal,
  }: DeployServiceRequest): Promise<{
    job: JobDescription;
    server: SingleModelServerInfo;
  }> {
    const { controller, mlflow } = this.options;
    const locator = modelLocator({
      name: model.name,
      stage: model.stage.toLowerCase(),
    });


    return this.track("single_model", deploymentName, async () => {
      const job = await this.submitAndWait(
        {
          name: deploymentName,
          presetName: preset,
          tags: encodeServerTags(
            controller,
            InferenceServerType.SingleModel,
            model,
          ),
          description: `Serving ${locator}`,
          container: {
            image,
            command: ["/bin/bash"],
            args: [
              "-c",
              `mlflow models serve -m ${locator} --host=0.0.0.0 --port=${SINGLE_MODEL_PORT} --env-manager conda`,
            ],
            env: { MLFLOW_TRACKING_URI: mlflow.trackingUri },
            secretEnv: {
              MLFLOW_TRACKING_TOKEN: {
                secretName: mlflow.tokenSecret.name,
                key: mlflow.tokenSecret.key,
                optional: true,
              },
            },
            httpPort: SINGLE_MODEL_PORT,
            httpAuth: enableAuth,
            volumes: [],
            shm: true,
          },
        },
        signal,
      );
      return {
        job,
        server: {
          type: InferenceServerType.SingleModel,
          jobId: job.id,
          job,
        },
      };
    });
  }

  /**
   * Provision a multi-model server in explicit model control mode.
   *
   * @returns null when a job with that name already exists
   */
  async deployServer({
    serverName,
    preset,
    image,
    enableAuth,
    signal,
  }: DeployServerRequest): Promise<MultiModelServerInfo | null> {
    const { controller, modelRepository } = this.options;

    try {
      return await this.track("multi_model_server", serverName, async () => {
        const mountPath = modelRepository.mountPath?.replace(/\/+$/, "");
        if (!mountPath) {
          throw new PreconditionViolationError(
            `No shared model repository is mounted, set ${MODEL_REPOSITORY_ENV}`,
            { deploymentName: serverName },
          );
        }
        // The server only sees models written here through the shared volume
        if (!modelRepository.storage) {
          throw new PreconditionViolationError(
            `No shared volume backs the model repository, set ${MODEL_REPOSITORY_STORAGE_ENV}`,
            { deploymentName: serverName },
          );
        }
        await fs.mkdir(mountPath, { recursive: true });

        const volumes: JobVolumeMount[] = [
          { ...modelRepository.storage, mountPath, readOnly: false },
        ];

        const job = await this.submitAndWait(
          {
            name: serverName,
            presetName: preset,
            tags: encodeServerTags(controller, InferenceServerType.MultiModel),
            description: "Multi-model inference server",
            container: {
              image,
              command: ["/bin/bash"],
              args: [
                "-c",
                `tritonserver --model-control-mode=explicit --strict-model-config=false --model-repository=$${MODEL_REPOSITORY_ENV} --http-port=${MULTI_MODEL_PORT}`,
              ],
              env: { [MODEL_REPOSITORY_ENV]: `${mountPath}/` },
              secretEnv: {},
              httpPort: MULTI_MODEL_PORT,
              httpAuth: enableAuth,
              volumes,
              shm: true,
            },
          },
          signal,
        );
        const server: MultiModelServerInfo = {
          type: InferenceServerType.MultiModel,
          jobId: job.id,
          job,
        };
        return server;
      });
    } catch (error) {
      if (error instanceof NameCollisionError) {
        logger.warn(
          { deploymentName: serverName },
          "Multi-model server already exists, not provisioning",
        );
        return null;
      }
      throw error;
    }
  }

  /**
   * Register `model` on a running multi-model server.
   */
  async deployModel({
    server,
    model,
    deploymentName,
    flavor,
    signal,
  }: DeployModelRequest): Promise<CreatedDeployment> {
    return this.track("multi_model_registration", deploymentName, () =>
      withServerContext(server, async (context) => {
        if (signal?.aborted) {
          throw new DeploymentCancelledError("Deployment was cancelled", {
            jobId: server.jobId,
            deploymentName,
          });
        }

        const created = await this.options.deploymentClient.createDeployment(
          context,
          {
            name: deploymentName,
            modelUri: model.registry?.uri ?? modelLocator(model),
            flavor,
          },
        );
        if (created.name !== deploymentName) {
          throw new DeploymentMismatchError(
            `Server registered ${created.name} instead of ${deploymentName}`,
            { jobId: server.jobId, deploymentName },
          );
        }
        return created;
      }),
    );
  }

  /**
   * Register a model on an existing multi-model server, or on a new one
   * provisioned first.
   */
  async deployToMultiModelServer({
    model,
    deploymentName,
    flavor,
    target,
    signal,
  }: DeployToMultiModelServerRequest): Promise<{
    server: MultiModelServerInfo;
    deployment: CreatedDeployment;
  }> {
    const server =
      target.type === "existing"
        ? await this.findMultiModelServer(target.serverJobId)
        : await this.deployServer({ ...target, signal });

    if (!server) {
      throw new ServerResolutionError("No model-compatible server selected", {
        deploymentName,
        jobId: target.type === "existing" ? target.serverJobId : undefined,
      });
    }

    const deployment = await this.deployModel({
      server,
      model,
      deploymentName,
      flavor,
      signal,
    });
    return { server, deployment };
  }

  private async findMultiModelServer(
    jobId: string,
  ): Promise<MultiModelServerInfo | null> {
    const server = await this.options.directory.findActiveServer(
      jobId,
      InferenceServerType.MultiModel,
    );
    return server?.type === InferenceServerType.MultiModel ? server : null;
  }

  private async submitAndWait(
    submission: JobSubmission,
    signal?: AbortSignal,
  ): Promise<JobDescription> {
    const { fabric, readiness } = this.options;
    let job: JobDescription;
    try {
      job = await fabric.submitJob(submission);
    } catch (error) {
      if (error instanceof FabricNameConflictError) {
        throw new NameCollisionError(submission.name, {}, { cause: error });
      }
      throw new SubmissionError(
        `Could not submit deployment ${submission.name}: ${errorMessage(error)}`,
        { deploymentName: submission.name },
        { cause: error },
      );
    }

    logger.info(
      { jobId: job.id, deploymentName: submission.name },
      "Job submitted, waiting for it to start",
    );
    return waitForJobReady(fabric, job.id, { ...readiness, signal });
  }

  /**
   * Report the outcome and duration of one deployment. Failures that are not
   * part of the deployment error taxonomy become backend failures.
   */
  private async track<T>(
    backend: DeploymentBackend,
    deploymentName: string,
    deploy: () => Promise<T>,
  ): Promise<T> {
    const startedAt = Date.now();
    const report = (outcome: string) =>
      metrics.deployments.reportDeployment({
        backend,
        outcome,
        durationSeconds: (Date.now() - startedAt) / 1000,
      });

    try {
      const result = await deploy();
      report("success");
      logger.info({ backend, deploymentName }, "Deployment succeeded");
      return result;
    } catch (error) {
      const failure = isDeploymentError(error)
        ? error
        : new BackendError(
            `Deployment ${deploymentName} failed: ${errorMessage(error)}`,
            { deploymentName },
            { cause: error },
          );
      report(failure.code);
      logger.error(
        { backend, deploymentName, ...failure.logContext, err: failure },
        "Deployment failed",
      );
      throw failure;
    }
  }
}
