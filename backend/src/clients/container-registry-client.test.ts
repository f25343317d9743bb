import { vi } from "vitest";
import { beforeEach, describe, expect, test } from "@/test";
import { ContainerRegistryClient } from "./container-registry-client";

// Mock global fetch
const mockFetch = vi.fn();
global.fetch = mockFetch;

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status });

describe("ContainerRegistryClient", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  test("exchanges an anonymous token before listing tags", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ token: "anon-token" }))
      .mockResolvedValueOnce(
        jsonResponse({ name: "mlflow/mlflow", tags: ["v2.13.0", "v2.14.1"] }),
      );
    const client = new ContainerRegistryClient({ baseUrl: "https://ghcr.io/" });

    await expect(client.listRepoTags("mlflow", "mlflow")).resolves.toEqual([
      "v2.13.0",
      "v2.14.1",
    ]);
    expect(mockFetch).toHaveBeenNthCalledWith(
      1,
      "https://ghcr.io/token?scope=repository%3Amlflow%2Fmlflow%3Apull",
      expect.anything(),
    );
    expect(mockFetch).toHaveBeenNthCalledWith(
      2,
      "https://ghcr.io/v2/mlflow/mlflow/tags/list",
      expect.objectContaining({
        headers: { Authorization: "Bearer anon-token" },
      }),
    );
  });

  test("uses the proxy_auth endpoint for nvcr.io", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ token: "anon-token" }))
      .mockResolvedValueOnce(jsonResponse({ tags: ["24.05-py3"] }));
    const client = new ContainerRegistryClient({ baseUrl: "https://nvcr.io" });

    await client.listRepoTags("nvidia", "tritonserver");

    expect(mockFetch).toHaveBeenNthCalledWith(
      1,
      "https://nvcr.io/proxy_auth?scope=repository%3Anvidia%2Ftritonserver%3Apull",
      expect.anything(),
    );
  });

  test("uses a configured token without an exchange", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ repositories: ["team/model-server"] }),
    );
    const client = new ContainerRegistryClient({
      baseUrl: "https://registry.example.com",
      token: "test-secret",
    });

    await expect(client.listCatalog()).resolves.toEqual(["team/model-server"]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch).toHaveBeenCalledWith(
      "https://registry.example.com/v2/_catalog",
      expect.objectContaining({
        headers: { Authorization: "Bearer test-secret" },
      }),
    );
  });

  test("treats a null tag list as empty", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ tags: null }));
    const client = new ContainerRegistryClient({
      baseUrl: "https://registry.example.com",
      token: "test-secret",
    });

    await expect(client.listRepoTags("team", "empty")).resolves.toEqual([]);
  });
});
