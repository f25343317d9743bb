import { LISTED_MODEL_STAGES } from "@shared";
import * as yaml from "js-yaml";
import { z } from "zod";
import { LRUCacheManager } from "@/cache-manager";
import { HttpStatusError } from "@/clients/http";
import {
  artifactPathFromSource,
  type MlflowClient,
  type MlflowModelVersion,
} from "@/clients/mlflow-client";
import { BackendError, errorMessage, ModelNotFoundError } from "@/errors";
import {
  type ModelInfo,
  type ModelStage,
  modelLocator,
} from "@/inference-runtime/types";
import logger from "@/logging";

/** The `MLmodel` file stored next to every logged model */
export const ModelDescriptorSchema = z.object({
  artifact_path: z.string().optional(),
  flavors: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
});
export type ModelDescriptor = z.infer<typeof ModelDescriptorSchema>;

const MODEL_URI_PATTERN = /^models:\/([^/]+)\/([^/]+)$/;

const CANONICAL_STAGES: Record<string, string> = {
  none: "None",
  staging: "Staging",
  production: "Production",
  archived: "Archived",
};

export function parseModelUri(modelUri: string): {
  name: string;
  reference: string;
} {
  const match = MODEL_URI_PATTERN.exec(modelUri);
  if (!match) {
    throw new BackendError(`Invalid model URI ${modelUri}`);
  }
  return { name: match[1], reference: match[2] };
}

export interface MlflowModelRegistryOptions {
  client: MlflowClient;
  /** Tracking URI as reachable by users, for links */
  publicUri: string;
  descriptorCacheSize: number;
}

/**
 * Model registry adapter on top of MLflow.
 */
export class MlflowModelRegistry {
  /**
   * Descriptors keyed by artifact source path.
   * A model version's artifacts never change once logged, so entries do not
   * expire and are only dropped by LRU eviction.
   */
  private readonly descriptors: LRUCacheManager<ModelDescriptor>;

  constructor(private readonly options: MlflowModelRegistryOptions) {
    this.descriptors = new LRUCacheManager<ModelDescriptor>({
      maxSize: options.descriptorCacheSize,
    });
  }

  get client(): MlflowClient {
    return this.options.client;
  }

  /**
   * Latest Staging and Production versions of every registered model
   */
  async listRegisteredModels(): Promise<ModelStage[]> {
    const { client } = this.options;
    const names = await client.searchRegisteredModels();
    const versionsPerModel = await Promise.all(
      names.map((name) => client.getLatestVersions(name, LISTED_MODEL_STAGES)),
    );
    return Promise.all(
      versionsPerModel.flat().map((version) => this.toModelStage(version)),
    );
  }

  /**
   * Resolve `models:/<name>/<stage-or-version>` to a concrete version.
   */
  async resolveModelVersion(modelUri: string): Promise<MlflowModelVersion> {
    const { name, reference } = parseModelUri(modelUri);
    const { client } = this.options;

    try {
      if (/^\d+$/.test(reference)) {
        return await client.getModelVersion(name, reference);
      }

      const stage = CANONICAL_STAGES[reference.toLowerCase()] ?? reference;
      const [latest] = await client.getLatestVersions(name, [stage]);
      if (!latest) {
        throw new ModelNotFoundError(
          `Model ${name} has no version in stage ${stage}`,
        );
      }
      return latest;
    } catch (error) {
      // MLflow answers RESOURCE_DOES_NOT_EXIST with a 404
      if (error instanceof HttpStatusError && error.status === 404) {
        throw new ModelNotFoundError(
          `No registered model version matches ${modelUri}`,
          {},
          { cause: error },
        );
      }
      throw error;
    }
  }

  /**
   * The registered version a deployment of `model` would serve.
   *
   * @throws ModelNotFoundError when the stage currently holds another version
   */
  async resolveModel({ name, stage, version }: ModelInfo): Promise<ModelStage> {
    const resolved = await this.resolveModelVersion(
      modelLocator({ name, stage }),
    );
    if (resolved.version !== version) {
      throw new ModelNotFoundError(
        `Model ${name} has no version ${version} in stage ${resolved.current_stage}, it holds version ${resolved.version}`,
      );
    }
    return this.toModelStage(resolved);
  }

  async getModelDescriptor(source: string): Promise<ModelDescriptor> {
    return this.descriptors.getOrSet(source, async () => {
      const path = `${artifactPathFromSource(source)}/MLmodel`;
      const content = await this.options.client.downloadArtifact(path);

      let document: unknown;
      try {
        document = yaml.load(content.toString("utf8"));
      } catch (error) {
        throw new BackendError(`Malformed MLmodel at ${path}`, {}, {
          cause: error,
        });
      }
      const parsed = ModelDescriptorSchema.safeParse(document);
      if (!parsed.success) {
        throw new BackendError(
          `Unexpected MLmodel at ${path}: ${parsed.error.message}`,
        );
      }
      return parsed.data;
    });
  }

  private async toModelStage(version: MlflowModelVersion): Promise<ModelStage> {
    const { client, publicUri } = this.options;
    const versionPath = `#/models/${encodeURIComponent(version.name)}/versions/${version.version}`;

    let flavors: string[] = [];
    if (version.source) {
      try {
        flavors = Object.keys(
          (await this.getModelDescriptor(version.source)).flavors,
        );
      } catch (error) {
        logger.warn(
          {
            model: version.name,
            version: version.version,
            error: errorMessage(error),
          },
          "Could not read model descriptor, listing without flavors",
        );
      }
    }

    return {
      name: version.name,
      stage: version.current_stage,
      version: version.version,
      registry: {
        createdAt: new Date(version.creation_timestamp),
        uri: `models:/${version.name}/${version.current_stage}`,
        link: `${client.trackingUri}/${versionPath}`,
        publicLink: `${publicUri}/${versionPath}`,
        source: version.source,
        flavors,
      },
    };
  }
}
