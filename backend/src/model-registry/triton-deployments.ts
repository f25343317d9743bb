import fs from "node:fs/promises";
import path from "node:path";
import { SupportedFlavorSchema } from "@shared";
import { z } from "zod";
import { artifactPathFromSource } from "@/clients/mlflow-client";
import { MODEL_STATE_READY, TritonClient } from "@/clients/triton-client";
import {
  errorMessage,
  NameCollisionError,
  UnsupportedFlavorError,
} from "@/errors";
import type {
  CreateDeploymentRequest,
  CreatedDeployment,
  MultiModelDeployment,
  MultiModelDeploymentClient,
  MultiModelServerContext,
} from "@/inference-runtime/types";
import logger from "@/logging";
import type { MlflowModelRegistry } from "./mlflow-registry";

export const META_FILE_NAME = "mlflow-meta.json";
const ONNX_MODEL_VERSION_DIR = "1";
const ONNX_MODEL_FILE = "model.onnx";
const TRITON_CONFIG_FILE = "config.pbtxt";

const MetaFileSchema = z.object({
  name: z.string(),
  triton_model_path: z.string(),
  mlflow_model_uri: z.string(),
  flavor: z.string(),
});

export interface TritonDeploymentClientOptions {
  registry: MlflowModelRegistry;
  timeoutMs: number;
  createTritonClient?: (managementUrl: string) => TritonClient;
}

/**
 * Places MLflow models into a Triton model repository and loads them.
 *
 * Every placed model gets an `mlflow-meta.json` next to it; models without one
 * were not deployed from the registry and are left out of listings.
 */
export class TritonDeploymentClient implements MultiModelDeploymentClient {
  constructor(private readonly options: TritonDeploymentClientOptions) {}

  async createDeployment(
    context: MultiModelServerContext,
    { name, modelUri, flavor }: CreateDeploymentRequest,
  ): Promise<CreatedDeployment> {
    const errorContext = { jobId: context.serverJobId, deploymentName: name };
    const supportedFlavor = SupportedFlavorSchema.safeParse(flavor);
    if (!supportedFlavor.success) {
      throw new UnsupportedFlavorError(
        `Unsupported model format "${flavor}", expected one of ${SupportedFlavorSchema.options.join(", ")}`,
        errorContext,
      );
    }

    const { registry } = this.options;
    const version = await registry.resolveModelVersion(modelUri);
    const descriptor = await registry.getModelDescriptor(version.source);
    const flavorConfig = descriptor.flavors[flavor];
    if (!flavorConfig) {
      throw new UnsupportedFlavorError(
        `Unsupported model format: ${modelUri} was not saved in the ${flavor} format`,
        errorContext,
      );
    }

    const triton = this.tritonClient(context);
    const modelDir = path.join(context.modelRepositoryPath, name);
    const index = await triton.getRepositoryIndex();
    if (index.some((entry) => entry.name === name)) {
      throw new NameCollisionError(name, errorContext);
    }
    // Creating the directory claims the name, so of two concurrent requests one loses
    await fs.mkdir(context.modelRepositoryPath, { recursive: true });
    try {
      await fs.mkdir(modelDir);
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        throw new NameCollisionError(name, errorContext);
      }
      throw error;
    }

    const sourcePath = artifactPathFromSource(version.source);
    try {
      if (supportedFlavor.data === "onnx") {
        await this.placeOnnxModel(sourcePath, flavorConfig, modelDir);
      } else {
        await this.placeTritonModel(sourcePath, flavorConfig, modelDir);
      }

      const meta: z.infer<typeof MetaFileSchema> = {
        name,
        triton_model_path: modelDir,
        mlflow_model_uri: modelUri,
        flavor,
      };
      await fs.writeFile(
        path.join(modelDir, META_FILE_NAME),
        JSON.stringify(meta, null, 2),
      );

      await triton.loadModel(name);
    } catch (error) {
      await fs.rm(modelDir, { recursive: true, force: true });
      throw error;
    }

    logger.info(
      { ...errorContext, modelUri, flavor, modelDir },
      "Registered model on multi-model server",
    );
    return { name, flavor: supportedFlavor.data };
  }

  async listDeployments(
    context: MultiModelServerContext,
  ): Promise<MultiModelDeployment[]> {
    const index = await this.tritonClient(context).getRepositoryIndex();
    const deployments: MultiModelDeployment[] = [];

    for (const entry of index) {
      if (entry.state !== MODEL_STATE_READY) {
        continue;
      }
      const metaPath = path.join(
        context.modelRepositoryPath,
        entry.name,
        META_FILE_NAME,
      );
      if (!(await exists(metaPath))) {
        continue;
      }
      try {
        const meta = MetaFileSchema.parse(
          JSON.parse(await fs.readFile(metaPath, "utf8")),
        );
        deployments.push({
          name: meta.name,
          mlflowModelUri: meta.mlflow_model_uri,
          flavor: meta.flavor,
          tritonModelPath: meta.triton_model_path,
        });
      } catch (error) {
        logger.warn(
          { metaPath, error: errorMessage(error) },
          "Skipping model with unreadable deployment metadata",
        );
      }
    }

    return deployments;
  }

  private tritonClient(context: MultiModelServerContext): TritonClient {
    const { createTritonClient, timeoutMs } = this.options;
    return createTritonClient
      ? createTritonClient(context.managementUrl)
      : new TritonClient(context.managementUrl, timeoutMs);
  }

  /**
   * `<repo>/<name>/1/model.onnx`, plus the model's config.pbtxt when it has one
   */
  private async placeOnnxModel(
    sourcePath: string,
    flavorConfig: Record<string, unknown>,
    modelDir: string,
  ): Promise<void> {
    const { client } = this.options.registry;
    const dataFile =
      typeof flavorConfig.data === "string" ? flavorConfig.data : ONNX_MODEL_FILE;

    const versionDir = path.join(modelDir, ONNX_MODEL_VERSION_DIR);
    await fs.mkdir(versionDir, { recursive: true });
    await fs.writeFile(
      path.join(versionDir, ONNX_MODEL_FILE),
      await client.downloadArtifact(`${sourcePath}/${dataFile}`),
    );

    const artifacts = await client.listArtifacts(sourcePath);
    const config = artifacts.find(
      (artifact) =>
        !artifact.isDir && path.posix.basename(artifact.path) === TRITON_CONFIG_FILE,
    );
    if (config) {
      await fs.writeFile(
        path.join(modelDir, TRITON_CONFIG_FILE),
        await client.downloadArtifact(config.path),
      );
    }
  }

  /**
   * Copy the logged Triton model directory to `<repo>/<name>`
   */
  private async placeTritonModel(
    sourcePath: string,
    flavorConfig: Record<string, unknown>,
    modelDir: string,
  ): Promise<void> {
    const { client } = this.options.registry;
    let modelPath: string | undefined;
    if (typeof flavorConfig.data === "string") {
      modelPath = `${sourcePath}/${flavorConfig.data}`;
    } else {
      const artifacts = await client.listArtifacts(sourcePath);
      modelPath = artifacts.find((artifact) => artifact.isDir)?.path;
    }
    if (!modelPath) {
      throw new UnsupportedFlavorError(
        `Unsupported model format: no Triton model directory under ${sourcePath}`,
      );
    }
    await this.copyArtifactTree(modelPath, modelDir);
  }

  private async copyArtifactTree(
    artifactPath: string,
    destination: string,
  ): Promise<void> {
    const { client } = this.options.registry;
    await fs.mkdir(destination, { recursive: true });
    for (const artifact of await client.listArtifacts(artifactPath)) {
      const target = path.join(destination, path.posix.basename(artifact.path));
      if (artifact.isDir) {
        await this.copyArtifactTree(artifact.path, target);
      } else {
        await fs.writeFile(target, await client.downloadArtifact(artifact.path));
      }
    }
  }
}

async function exists(target: string): Promise<boolean> {
  return fs
    .access(target)
    .then(() => true)
    .catch(() => false);
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
