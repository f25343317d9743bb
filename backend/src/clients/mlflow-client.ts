import { z } from "zod";
import { BackendError } from "@/errors";
import logger from "@/logging";
import { ensureOk, fetchWithTimeout, parseJsonResponse } from "./http";

export const MlflowModelVersionSchema = z.object({
  name: z.string(),
  version: z.string(),
  /** Milliseconds since epoch, serialized as a string by some MLflow versions */
  creation_timestamp: z.coerce.number(),
  current_stage: z.string().default("None"),
  source: z.string().default(""),
  run_id: z.string().optional(),
  status: z.string().optional(),
});
export type MlflowModelVersion = z.infer<typeof MlflowModelVersionSchema>;

const SearchRegisteredModelsResponseSchema = z.object({
  registered_models: z
    .array(
      z.object({
        name: z.string(),
        latest_versions: z.array(MlflowModelVersionSchema).optional(),
      }),
    )
    .default([]),
  next_page_token: z.string().optional(),
});

const LatestVersionsResponseSchema = z.object({
  model_versions: z.array(MlflowModelVersionSchema).default([]),
});

const ModelVersionResponseSchema = z.object({
  model_version: MlflowModelVersionSchema,
});

const ListArtifactsResponseSchema = z.object({
  files: z
    .array(
      z.object({
        path: z.string(),
        is_dir: z.boolean().default(false),
        file_size: z.coerce.number().optional(),
      }),
    )
    .default([]),
});

export interface MlflowArtifact {
  /** Path relative to the artifact store root */
  path: string;
  isDir: boolean;
  size?: number;
}

export interface MlflowClientOptions {
  trackingUri: string;
  token?: string;
  timeoutMs: number;
}

const SEARCH_PAGE_SIZE = 100;
const ARTIFACT_SCHEME = "mlflow-artifacts:";
const API_PREFIX = "/api/2.0/mlflow";
const ARTIFACTS_PREFIX = "/api/2.0/mlflow-artifacts/artifacts";

/**
 * Strip the `mlflow-artifacts:` scheme (and optional authority) from an artifact location.
 * Only locations served through the tracking server's artifact proxy can be read.
 */
export function artifactPathFromSource(source: string): string {
  if (!source.startsWith(ARTIFACT_SCHEME)) {
    throw new BackendError(
      `Artifact location ${source} is not served by the tracking server`,
    );
  }
  const { pathname } = new URL(source);
  return decodeURIComponent(pathname).replace(/^\/+|\/+$/g, "");
}

/**
 * REST client for the MLflow tracking server.
 */
export class MlflowClient {
  constructor(private readonly options: MlflowClientOptions) {}

  get trackingUri(): string {
    return this.options.trackingUri;
  }

  /**
   * All registered model names, following pagination to the end
   */
  async searchRegisteredModels(): Promise<string[]> {
    const names: string[] = [];
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams({
        max_results: String(SEARCH_PAGE_SIZE),
      });
      if (pageToken) {
        params.set("page_token", pageToken);
      }
      const page = await parseJsonResponse(
        await this.request(
          `${API_PREFIX}/registered-models/search?${params.toString()}`,
        ),
        SearchRegisteredModelsResponseSchema,
        "Searching registered models",
      );
      names.push(...page.registered_models.map((model) => model.name));
      pageToken = page.next_page_token || undefined;
    } while (pageToken);

    return names;
  }

  async getLatestVersions(
    name: string,
    stages: readonly string[],
  ): Promise<MlflowModelVersion[]> {
    const response = await parseJsonResponse(
      await this.request(`${API_PREFIX}/registered-models/get-latest-versions`, {
        method: "POST",
        body: JSON.stringify({ name, stages }),
      }),
      LatestVersionsResponseSchema,
      `Fetching latest versions of ${name}`,
    );
    return response.model_versions;
  }

  async getModelVersion(
    name: string,
    version: string,
  ): Promise<MlflowModelVersion> {
    const params = new URLSearchParams({ name, version });
    const response = await parseJsonResponse(
      await this.request(`${API_PREFIX}/model-versions/get?${params.toString()}`),
      ModelVersionResponseSchema,
      `Fetching version ${version} of ${name}`,
    );
    return response.model_version;
  }

  /**
   * List the direct children of an artifact directory.
   */
  async listArtifacts(path: string): Promise<MlflowArtifact[]> {
    const params = new URLSearchParams({ path });
    const response = await parseJsonResponse(
      await this.request(`${ARTIFACTS_PREFIX}?${params.toString()}`),
      ListArtifactsResponseSchema,
      `Listing artifacts of ${path}`,
    );
    return response.files.map((file) => ({
      // The proxy reports paths relative to the listed directory
      path: `${path}/${file.path.split("/").pop() ?? file.path}`,
      isDir: file.is_dir,
      size: file.file_size,
    }));
  }

  async downloadArtifact(path: string): Promise<Buffer> {
    const encoded = path.split("/").map(encodeURIComponent).join("/");
    const response = await ensureOk(
      await this.request(`${ARTIFACTS_PREFIX}/${encoded}`),
      `Downloading artifact ${path}`,
    );
    logger.debug({ path }, "Downloaded MLflow artifact");
    return Buffer.from(await response.arrayBuffer());
  }

  private request(path: string, init: RequestInit = {}): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/json",
    };
    if (init.body) {
      headers["Content-Type"] = "application/json";
    }
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return fetchWithTimeout(
      `${this.options.trackingUri}${path}`,
      { ...init, headers },
      this.options.timeoutMs,
    );
  }
}
