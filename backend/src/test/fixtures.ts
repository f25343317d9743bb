/**
 * biome-ignore-all lint/correctness/noEmptyPattern: oddly enough in extend below this is required
 * see https://vitest.dev/guide/test-context.html#extend-test-context
 */
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { InferenceServerType } from "@shared";
import { test as baseTest } from "vitest";
import type { JobContainer, JobDescription } from "@/job-fabric";
import { encodeServerTags } from "@/inference-runtime/tag-codec";
import type {
  ModelInfo,
  ModelStage,
  MultiModelServerInfo,
  SingleModelServerInfo,
} from "@/inference-runtime/types";
import { InMemoryJobFabric } from "./in-memory-job-fabric";

export const testController = {
  namespace: "in-job-deployments",
  id: "inference-server",
};

function makeModelStage(overrides: Partial<ModelStage> = {}): ModelStage {
  const name = overrides.name ?? "fraud-detector";
  const stage = overrides.stage ?? "Production";
  const version = overrides.version ?? "3";
  return {
    name,
    stage,
    version,
    registry: {
      createdAt: new Date("2024-04-01T08:00:00.000Z"),
      uri: `models:/${name}/${stage}`,
      link: `http://mlflow.test/#/models/${name}/versions/${version}`,
      publicLink: `https://mlflow.example.com/#/models/${name}/versions/${version}`,
      source: `mlflow-artifacts:/1/abc123/artifacts/model`,
      flavors: ["python_function", "onnx"],
    },
    ...overrides,
  };
}

function makeContainer(overrides: Partial<JobContainer> = {}): JobContainer {
  return {
    image: "busybox:latest",
    env: {},
    secretEnv: {},
    httpAuth: false,
    volumes: [],
    shm: false,
    ...overrides,
  };
}

/**
 * Seed a running single-model server job on the fabric
 */
function makeSingleModelServer(
  fabric: InMemoryJobFabric,
  model: ModelInfo,
  overrides: Partial<JobDescription> = {},
): SingleModelServerInfo {
  const job = fabric.addJob({
    tags: encodeServerTags(
      testController,
      InferenceServerType.SingleModel,
      model,
    ),
    container: makeContainer({ image: "ghcr.io/mlflow/mlflow:2.14.1", httpPort: 5000 }),
    ...overrides,
  });
  return {
    type: InferenceServerType.SingleModel,
    jobId: job.id,
    job,
  };
}

/**
 * Seed a running multi-model server job whose repository is `repositoryPath`
 */
function makeMultiModelServer(
  fabric: InMemoryJobFabric,
  repositoryPath: string | undefined,
  overrides: Partial<JobDescription> = {},
): MultiModelServerInfo {
  const job = fabric.addJob({
    tags: encodeServerTags(testController, InferenceServerType.MultiModel),
    container: makeContainer({
      image: "nvcr.io/nvidia/tritonserver:24.05-py3",
      httpPort: 8000,
      env: repositoryPath ? { TRITON_MODEL_REPO: repositoryPath } : {},
    }),
    ...overrides,
  });
  return {
    type: InferenceServerType.MultiModel,
    jobId: job.id,
    job,
  };
}

interface TestFixtures {
  fabric: InMemoryJobFabric;
  tempDir: string;
  makeModelStage: typeof makeModelStage;
  makeContainer: typeof makeContainer;
  makeSingleModelServer: typeof makeSingleModelServer;
  makeMultiModelServer: typeof makeMultiModelServer;
}

export const test = baseTest.extend<TestFixtures>({
  fabric: async ({}, use) => {
    await use(new InMemoryJobFabric());
  },
  tempDir: async ({}, use) => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "deployer-test-"));
    await use(dir);
    await fs.rm(dir, { recursive: true, force: true });
  },
  makeModelStage: async ({}, use) => {
    await use(makeModelStage);
  },
  makeContainer: async ({}, use) => {
    await use(makeContainer);
  },
  makeSingleModelServer: async ({}, use) => {
    await use(makeSingleModelServer);
  },
  makeMultiModelServer: async ({}, use) => {
    await use(makeMultiModelServer);
  },
});
