import { vi } from "vitest";
import config from "@/config";
import { UnsupportedFlavorError } from "@/errors";
import {
  createInferenceRuntime,
  type MultiModelDeploymentClient,
  setInferenceRuntime,
} from "@/inference-runtime";
import { createFastifyInstance } from "@/server";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  type InMemoryJobFabric,
  test,
} from "@/test";
import deploymentRoutes from "./deployment";

// Mock global fetch
const mockFetch = vi.fn();
global.fetch = mockFetch;

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

/**
 * A registry holding version 3 of fraud-detector in Production and nothing else
 */
function serveRegistry() {
  mockFetch.mockImplementation(async (url: string, init?: RequestInit) => {
    if (url.endsWith("/registered-models/get-latest-versions")) {
      return String(init?.body).includes('"name":"fraud-detector"')
        ? jsonResponse({
            model_versions: [
              {
                name: "fraud-detector",
                version: "3",
                creation_timestamp: 1714550400000,
                current_stage: "Production",
                source: "mlflow-artifacts:/1/abc123/artifacts/model",
              },
            ],
          })
        : jsonResponse(
            {
              error_code: "RESOURCE_DOES_NOT_EXIST",
              message: "Registered Model not found",
            },
            404,
          );
    }
    return new Response("flavors:\n  python_function: {}\n");
  });
}

const originalReadiness = { ...config.readiness };
const originalMountPath = config.modelRepository.mountPath;
const originalStorage = config.modelRepository.storage;

async function makeApp(fabric: InMemoryJobFabric) {
  const deploymentClient = {
    createDeployment: vi.fn<MultiModelDeploymentClient["createDeployment"]>(
      async (_context, request) => ({ name: request.name, flavor: "onnx" }),
    ),
    listDeployments: vi.fn<MultiModelDeploymentClient["listDeployments"]>(
      async () => [],
    ),
  };
  setInferenceRuntime(createInferenceRuntime({ fabric, deploymentClient }));
  const app = createFastifyInstance();
  await app.register(deploymentRoutes);
  return { app, deploymentClient };
}

const singleModelRequest = {
  model: { name: "fraud-detector", stage: "Production", version: "3" },
  preset: "cpu-small",
  image: "ghcr.io/mlflow/mlflow:2.14.1",
};

describe("deployment routes", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    serveRegistry();
  });

  afterEach(() => {
    setInferenceRuntime(undefined);
    config.readiness.timeoutMs = originalReadiness.timeoutMs;
    config.readiness.intervalMs = originalReadiness.intervalMs;
    config.modelRepository.mountPath = originalMountPath;
    config.modelRepository.storage = originalStorage;
  });

  describe("POST /api/deployments/single-model", () => {
    test("deploys under the default name", async ({ fabric }) => {
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/single-model",
        payload: singleModelRequest,
      });

      expect(response.statusCode).toBe(200);
      const [submission] = fabric.submissions;
      expect(response.json()).toEqual({
        serverName: "fraud-detector-production",
        jobId: expect.any(String),
        serverType: "MLFlow",
        status: "running",
        preset: "cpu-small",
        owner: "test-user",
        createdAt: "2024-05-01T12:00:00.000Z",
        endpointUrl:
          "http://fraud-detector-production.default.svc.cluster.local:5000",
      });
      expect(submission.name).toBe("fraud-detector-production");
      expect(submission.container.httpAuth).toBe(true);
      expect(submission.tags).toContain(
        "model-info::fraud-detector:Production:3",
      );

      await app.close();
    });

    test("answers 404 for a model the registry does not know", async ({
      fabric,
    }) => {
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/single-model",
        payload: {
          ...singleModelRequest,
          model: { name: "not-registered", stage: "Production", version: "999" },
        },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: {
          message:
            "No registered model version matches models:/not-registered/Production",
          type: "api_not_found_error",
        },
      });
      expect(fabric.submissions).toEqual([]);

      await app.close();
    });

    test("answers 404 when the stage holds another version", async ({
      fabric,
    }) => {
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/single-model",
        payload: {
          ...singleModelRequest,
          model: { name: "fraud-detector", stage: "Production", version: "2" },
        },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe(
        "Model fraud-detector has no version 2 in stage Production, it holds version 3",
      );
      expect(fabric.submissions).toEqual([]);

      await app.close();
    });

    test("answers 409 when the name is taken", async ({ fabric }) => {
      fabric.addJob({ name: "fraud-detector-prod" });
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/single-model",
        payload: { ...singleModelRequest, deploymentName: "fraud-detector-prod" },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toEqual({
        error: {
          message: "Deployment with name fraud-detector-prod already exists",
          type: "api_conflict_error",
        },
      });

      await app.close();
    });

    test("rejects names the fabric would not accept", async ({ fabric }) => {
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/single-model",
        payload: { ...singleModelRequest, deploymentName: "Fraud_Detector" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.type).toBe("api_validation_error");
      expect(fabric.submissions).toEqual([]);

      await app.close();
    });

    test("rejects a default name that breaks the naming rules", async ({
      fabric,
    }) => {
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/single-model",
        payload: {
          ...singleModelRequest,
          model: { name: "fraud__detector", stage: "Production", version: "3" },
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: {
          message:
            "Invalid deployment name fraud--detector-production: Name may contain only lowercase letters, digits and single hyphens between them, and must start with a letter",
          type: "api_validation_error",
        },
      });

      await app.close();
    });

    test("answers 504 when the server does not start in time", async ({
      fabric,
    }) => {
      fabric.pendingPolls = Number.POSITIVE_INFINITY;
      config.readiness.timeoutMs = 20;
      config.readiness.intervalMs = 5;
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/single-model",
        payload: singleModelRequest,
      });

      expect(response.statusCode).toBe(504);
      expect(response.json().error.type).toBe("api_gateway_timeout_error");

      await app.close();
    });
  });

  describe("POST /api/deployments/multi-model", () => {
    test("registers the model on an existing server", async ({
      fabric,
      tempDir,
      makeMultiModelServer,
    }) => {
      const server = makeMultiModelServer(fabric, tempDir, { name: "triton-a" });
      const { app, deploymentClient } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/multi-model",
        payload: {
          model: { name: "ocr", stage: "Production", version: "7" },
          deploymentName: "ocr",
          target: { type: "existing", serverJobId: server.jobId },
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        server: {
          serverName: "triton-a",
          jobId: server.jobId,
          serverType: "Triton",
          status: "running",
          preset: "cpu-small",
          owner: "test-user",
          createdAt: "2024-05-01T12:00:00.000Z",
          endpointUrl: "http://triton-a.default.svc.cluster.local:8000",
        },
        deployment: { name: "ocr", flavor: "onnx" },
      });
      expect(deploymentClient.createDeployment).toHaveBeenCalledWith(
        expect.objectContaining({ modelRepositoryPath: tempDir }),
        { name: "ocr", modelUri: "models:/ocr/Production", flavor: "onnx" },
      );

      await app.close();
    });

    test("answers 400 when no server is selected", async ({ fabric }) => {
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/multi-model",
        payload: {
          model: { name: "ocr", stage: "Production", version: "7" },
          target: { type: "existing", serverJobId: "job-404" },
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: {
          message: "No model-compatible server selected",
          type: "api_validation_error",
        },
      });

      await app.close();
    });

    test("answers 422 for a model format the server cannot load", async ({
      fabric,
      tempDir,
      makeMultiModelServer,
    }) => {
      const server = makeMultiModelServer(fabric, tempDir, { name: "triton-a" });
      const { app, deploymentClient } = await makeApp(fabric);
      deploymentClient.createDeployment.mockRejectedValueOnce(
        new UnsupportedFlavorError(
          "Unsupported model format: models:/ocr/Production was not saved in the triton format",
        ),
      );

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/multi-model",
        payload: {
          model: { name: "ocr", stage: "Production", version: "7" },
          flavor: "triton",
          target: { type: "existing", serverJobId: server.jobId },
        },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        error: {
          message:
            "Unsupported model format: models:/ocr/Production was not saved in the triton format",
          type: "api_unprocessable_entity_error",
        },
      });

      await app.close();
    });

    test("provisions a new server first", async ({ fabric, tempDir }) => {
      config.modelRepository.mountPath = tempDir;
      config.modelRepository.storage = { claimName: "model-store" };
      const { app } = await makeApp(fabric);

      const response = await app.inject({
        method: "POST",
        url: "/api/deployments/multi-model",
        payload: {
          model: { name: "ocr", stage: "Production", version: "7" },
          target: {
            type: "new",
            serverName: "triton-a",
            preset: "gpu-small",
            image: "nvcr.io/nvidia/tritonserver:24.05-py3",
          },
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        server: { serverName: "triton-a", serverType: "Triton", preset: "gpu-small" },
        deployment: { name: "ocr-production", flavor: "onnx" },
      });

      await app.close();
    });
  });
});
