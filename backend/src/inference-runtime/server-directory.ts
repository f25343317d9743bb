import {
  ENABLED_SERVER_TYPES,
  InferenceServerType,
} from "@shared";
import { ContainerRegistryClient } from "@/clients/container-registry-client";
import { errorMessage, StructuralDecodeError } from "@/errors";
import {
  ACTIVE_JOB_STATUSES,
  type JobDescription,
  type JobFabric,
} from "@/job-fabric";
import logger from "@/logging";
import { metrics } from "@/observability";
import {
  type ControllerIdentity,
  decodeServerType,
  ownershipTag,
  serverTypeTag,
} from "./tag-codec";
import type { InferenceServerInfo } from "./types";

/** Release tags of the Triton image, e.g. 24.05-py3 */
const TRITON_RELEASE_TAG = /^\d{1,2}\.\d{1,2}-py3$/;

export interface ImageSources {
  /** Triton server images, `<registry>/<owner>/<repo>` */
  triton: readonly string[];
  /** Single-model serving images hosted on GitHub's registry */
  github: readonly string[];
  platformRegistry: {
    url?: string;
    token?: string;
  };
}

export interface ListImagesOptions {
  triton?: boolean;
  github?: boolean;
  platform?: boolean;
}

export interface ServerDirectoryOptions {
  fabric: JobFabric;
  controller: ControllerIdentity;
  images: ImageSources;
}

/**
 * Finds the inference servers this controller owns and what can be deployed.
 *
 * Server records are decoded from job tags on every call and never cached:
 * the fabric is the only source of truth.
 */
export class ServerDirectory {
  constructor(private readonly options: ServerDirectoryOptions) {}

  /**
   * Active servers owned by this controller, optionally of one type only.
   * Jobs whose tags cannot be decoded are skipped.
   */
  async listActiveServers(
    type?: InferenceServerType,
  ): Promise<InferenceServerInfo[]> {
    const tags = [ownershipTag(this.options.controller)];
    if (type) {
      tags.push(serverTypeTag(type));
    }

    const servers: InferenceServerInfo[] = [];
    for await (const job of this.options.fabric.listJobs({
      statuses: ACTIVE_JOB_STATUSES,
      tags,
    })) {
      const server = this.classify(job);
      // A later conflicting type tag can match the filter while the first one decides
      if (server && (!type || server.type === type)) {
        servers.push(server);
      }
    }
    return servers;
  }

  async findActiveServer(
    jobId: string,
    type?: InferenceServerType,
  ): Promise<InferenceServerInfo | undefined> {
    const servers = await this.listActiveServers(type);
    return servers.find((server) => server.jobId === jobId);
  }

  async listPresets(): Promise<string[]> {
    const presets = await this.options.fabric.listPresets();
    return presets.map((preset) => preset.name);
  }

  /**
   * Deployable images from every requested source, in source order
   */
  async listImages({
    triton = false,
    github = false,
    platform = false,
  }: ListImagesOptions = {}): Promise<string[]> {
    const { images } = this.options;
    const sources = await Promise.all([
      triton ? [...images.triton] : [],
      github ? [...images.github] : [],
      platform ? this.listPlatformImages() : [],
    ]);
    return sources.flat();
  }

  /**
   * Tags of `<registry>/<owner>/<repo>`, oldest first.
   * Registry failures are logged and yield no tags.
   */
  async listImageTags(image: string): Promise<string[]> {
    const [registry, owner, ...repo] = image.split("/");
    if (!registry || !owner || repo.length === 0) {
      logger.warn({ image }, "Image is not of the form <registry>/<owner>/<repo>");
      return [];
    }

    try {
      const tags = await this.registryClient(registry).listRepoTags(
        owner,
        repo.join("/"),
      );
      const ordered = [...tags].reverse();
      return this.options.images.triton.includes(image)
        ? ordered.filter((tag) => TRITON_RELEASE_TAG.test(tag))
        : ordered;
    } catch (error) {
      logger.error(
        { image, error: errorMessage(error) },
        "Could not list image tags",
      );
      return [];
    }
  }

  private classify(job: JobDescription): InferenceServerInfo | null {
    let type: InferenceServerType;
    try {
      type = decodeServerType(job.tags);
    } catch (error) {
      if (!(error instanceof StructuralDecodeError)) {
        throw error;
      }
      logger.warn(
        { jobId: job.id, jobName: job.name, error: error.message },
        "Skipping job with undecodable server type",
      );
      metrics.deployments.reportDiscoverySkip("undecodable_type");
      return null;
    }

    if (!ENABLED_SERVER_TYPES.includes(type)) {
      logger.warn(
        { jobId: job.id, jobName: job.name, type },
        "Skipping job of a disabled server type",
      );
      metrics.deployments.reportDiscoverySkip("disabled_type");
      return null;
    }

    const base = { jobId: job.id, job };
    switch (type) {
      case InferenceServerType.SingleModel:
        return { ...base, type };
      case InferenceServerType.MultiModel:
        return { ...base, type };
      case InferenceServerType.None:
        return { ...base, type };
      default:
        return null;
    }
  }

  private async listPlatformImages(): Promise<string[]> {
    const { url } = this.options.images.platformRegistry;
    if (!url) {
      return [];
    }
    const client = this.registryClient(new URL(url).host);
    try {
      const repositories = await client.listCatalog();
      return repositories.map((repository) => `${client.host}/${repository}`);
    } catch (error) {
      logger.error(
        { registry: client.host, error: errorMessage(error) },
        "Could not list platform images",
      );
      return [];
    }
  }

  private registryClient(host: string): ContainerRegistryClient {
    const { url, token } = this.options.images.platformRegistry;
    const isPlatformRegistry = url !== undefined && new URL(url).host === host;
    return new ContainerRegistryClient({
      baseUrl: isPlatformRegistry ? url : `https://${host}`,
      token: isPlatformRegistry ? token : undefined,
    });
  }
}
