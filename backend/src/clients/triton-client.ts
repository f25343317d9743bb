import { z } from "zod";
import { ensureOk, fetchWithTimeout, parseJsonResponse } from "./http";

const RepositoryIndexSchema = z.array(
  z.object({
    name: z.string(),
    version: z.string().optional(),
    state: z.string().optional(),
    reason: z.string().optional(),
  }),
);
export type RepositoryIndexEntry = z.infer<typeof RepositoryIndexSchema>[number];

export const MODEL_STATE_READY = "READY";

/**
 * Client of the Triton HTTP/REST model repository extension.
 */
export class TritonClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
  ) {}

  /**
   * All models in the repository, loaded or not
   */
  async getRepositoryIndex(): Promise<RepositoryIndexEntry[]> {
    return parseJsonResponse(
      await this.post("/v2/repository/index"),
      RepositoryIndexSchema,
      "Reading the model repository index",
    );
  }

  async loadModel(name: string): Promise<void> {
    await ensureOk(
      await this.post(
        `/v2/repository/models/${encodeURIComponent(name)}/load`,
      ),
      `Loading model ${name}`,
    );
  }

  private post(path: string): Promise<Response> {
    return fetchWithTimeout(
      `${this.baseUrl}${path}`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{}",
      },
      this.timeoutMs,
    );
  }
}
