import { vi } from "vitest";
import {
  createInferenceRuntime,
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
import modelRegistryRoutes from "./model-registry";

// Mock global fetch
const mockFetch = vi.fn();
global.fetch = mockFetch;

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

async function makeApp(fabric: InMemoryJobFabric) {
  setInferenceRuntime(createInferenceRuntime({ fabric }));
  const app = createFastifyInstance();
  await app.register(modelRegistryRoutes);
  return app;
}

describe("GET /api/registered-models", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterEach(() => {
    setInferenceRuntime(undefined);
  });

  test("lists staged model versions with links and flavors", async ({
    fabric,
  }) => {
    mockFetch.mockImplementation(async (url: string) => {
      if (url.includes("/registered-models/search")) {
        return jsonResponse({ registered_models: [{ name: "fraud-detector" }] });
      }
      if (url.endsWith("/registered-models/get-latest-versions")) {
        return jsonResponse({
          model_versions: [
            {
              name: "fraud-detector",
              version: "3",
              creation_timestamp: 1714550400000,
              current_stage: "Production",
              source: "mlflow-artifacts:/1/abc123/artifacts/model",
            },
          ],
        });
      }
      return new Response("flavors:\n  python_function: {}\n  onnx: {}\n");
    });
    const app = await makeApp(fabric);

    const response = await app.inject({
      method: "GET",
      url: "/api/registered-models",
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual([
      {
        name: "fraud-detector",
        stage: "Production",
        version: "3",
        createdAt: "2024-05-01T08:00:00.000Z",
        uri: "models:/fraud-detector/Production",
        link: "http://mlflow.test/#/models/fraud-detector/versions/3",
        publicLink:
          "https://mlflow.example.com/#/models/fraud-detector/versions/3",
        source: "mlflow-artifacts:/1/abc123/artifacts/model",
        flavors: ["python_function", "onnx"],
      },
    ]);
    expect(mockFetch).toHaveBeenCalledWith(
      expect.stringContaining("http://mlflow.test/api/2.0/mlflow/registered-models/search"),
      expect.objectContaining({
        headers: expect.objectContaining({ Authorization: "Bearer test-secret" }),
      }),
    );

    await app.close();
  });

  test("answers 502 when the tracking server is down", async ({ fabric }) => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));
    const app = await makeApp(fabric);

    const response = await app.inject({
      method: "GET",
      url: "/api/registered-models",
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      error: {
        message: "Could not reach the platform: Could not reach mlflow.test",
        type: "api_bad_gateway_error",
      },
    });

    await app.close();
  });
});
