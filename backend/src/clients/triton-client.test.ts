import { vi } from "vitest";
import { beforeEach, describe, expect, test } from "@/test";
import { HttpStatusError } from "./http";
import { TritonClient } from "./triton-client";

// Mock global fetch
const mockFetch = vi.fn();
global.fetch = mockFetch;

describe("TritonClient", () => {
  let client: TritonClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new TritonClient("http://triton-a.default.svc.cluster.local:8000", 1000);
  });

  test("reads the repository index", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(
        JSON.stringify([
          { name: "ocr", version: "1", state: "READY" },
          { name: "broken", state: "UNAVAILABLE", reason: "unable to load" },
        ]),
      ),
    );

    await expect(client.getRepositoryIndex()).resolves.toEqual([
      { name: "ocr", version: "1", state: "READY" },
      { name: "broken", state: "UNAVAILABLE", reason: "unable to load" },
    ]);
    expect(mockFetch).toHaveBeenCalledWith(
      "http://triton-a.default.svc.cluster.local:8000/v2/repository/index",
      expect.objectContaining({ method: "POST", body: "{}" }),
    );
  });

  test("loads a model by name", async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 200 }));

    await client.loadModel("ocr");

    expect(mockFetch).toHaveBeenCalledWith(
      "http://triton-a.default.svc.cluster.local:8000/v2/repository/models/ocr/load",
      expect.objectContaining({ method: "POST" }),
    );
  });

  test("reports the server's error when a load fails", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: "failed to load 'ocr'" }), {
        status: 400,
      }),
    );

    const error = await client.loadModel("ocr").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({
      status: 400,
      message:
        'Loading model ocr failed with HTTP 400: {"error":"failed to load \'ocr\'"}',
    });
  });
});
