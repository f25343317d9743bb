import { z } from "zod";
import logger from "@/logging";
import { fetchWithTimeout, parseJsonResponse } from "./http";

const TokenResponseSchema = z.object({ token: z.string() });
const TagListSchema = z.object({
  name: z.string().optional(),
  tags: z.array(z.string()).nullable().default([]),
});
const CatalogSchema = z.object({
  repositories: z.array(z.string()).nullable().default([]),
});

/** Registries whose anonymous token endpoint is not at /token */
const TOKEN_PATHS: Record<string, string> = {
  "nvcr.io": "/proxy_auth",
};

export interface ContainerRegistryClientOptions {
  /** e.g. https://ghcr.io */
  baseUrl: string;
  /** Bearer token; an anonymous pull token is requested when omitted */
  token?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * Docker Registry HTTP API v2 client, limited to listing.
 */
export class ContainerRegistryClient {
  private readonly baseUrl: string;

  constructor(private readonly options: ContainerRegistryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  get host(): string {
    return new URL(this.baseUrl).host;
  }

  /**
   * Tags of `<owner>/<repo>` in the order the registry reports them
   */
  async listRepoTags(owner: string, repo: string): Promise<string[]> {
    const repository = `${owner}/${repo}`;
    const headers = await this.authHeaders(`repository:${repository}:pull`);
    const response = await parseJsonResponse(
      await fetchWithTimeout(
        `${this.baseUrl}/v2/${repository}/tags/list`,
        { headers },
        this.timeoutMs,
      ),
      TagListSchema,
      `Listing tags of ${this.host}/${repository}`,
    );
    return response.tags ?? [];
  }

  /**
   * Repository names hosted by the registry
   */
  async listCatalog(): Promise<string[]> {
    const headers = await this.authHeaders("registry:catalog:*");
    const response = await parseJsonResponse(
      await fetchWithTimeout(
        `${this.baseUrl}/v2/_catalog`,
        { headers },
        this.timeoutMs,
      ),
      CatalogSchema,
      `Listing repositories of ${this.host}`,
    );
    return response.repositories ?? [];
  }

  private get timeoutMs(): number {
    return this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async authHeaders(scope: string): Promise<Record<string, string>> {
    const token = this.options.token ?? (await this.getAnonymousToken(scope));
    return { Authorization: `Bearer ${token}` };
  }

  private async getAnonymousToken(scope: string): Promise<string> {
    const tokenPath = TOKEN_PATHS[this.host] ?? "/token";
    const params = new URLSearchParams({ scope });
    logger.debug({ host: this.host, scope }, "Requesting anonymous pull token");
    const response = await parseJsonResponse(
      await fetchWithTimeout(
        `${this.baseUrl}${tokenPath}?${params.toString()}`,
        {},
        this.timeoutMs,
      ),
      TokenResponseSchema,
      `Requesting a pull token from ${this.host}`,
    );
    return response.token;
  }
}
