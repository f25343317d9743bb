import type { InferenceServerType, SupportedFlavor } from "@shared";
import type { JobDescription } from "@/job-fabric";

/** Registry metadata of a model version */
export interface ModelRegistryMetadata {
  readonly createdAt: Date;
  /** Registry locator, `models:/<name>/<stage>` */
  readonly uri: string;
  readonly link: string;
  readonly publicLink: string;
  /** Artifact location of the model version */
  readonly source: string;
  readonly flavors: readonly string[];
}

/**
 * One model understood to be served, or one registered model version when
 * `registry` is present. Identity is (name, version).
 */
export interface ModelInfo {
  readonly name: string;
  readonly stage: string;
  readonly version: string;
  readonly registry?: ModelRegistryMetadata;
}

/** A model version as listed by the registry */
export type ModelStage = ModelInfo & { readonly registry: ModelRegistryMetadata };

export const UNKNOWN_MODEL_VERSION = "unknown";

export function isSameModel(a: ModelInfo, b: ModelInfo): boolean {
  return a.name === b.name && a.version === b.version;
}

export function modelLocator(model: Pick<ModelInfo, "name" | "stage">) {
  return `models:/${model.name}/${model.stage}`;
}

interface BaseServerInfo {
  readonly jobId: string;
  readonly job: JobDescription;
}

export interface SingleModelServerInfo extends BaseServerInfo {
  readonly type: typeof InferenceServerType.SingleModel;
}

export interface MultiModelServerInfo extends BaseServerInfo {
  readonly type: typeof InferenceServerType.MultiModel;
}

/** An orchestrator-owned job that serves nothing */
export interface NoneServerInfo extends BaseServerInfo {
  readonly type: typeof InferenceServerType.None;
}

export type InferenceServerInfo =
  | SingleModelServerInfo
  | MultiModelServerInfo
  | NoneServerInfo;

/** Servers are the same when they refer to the same job */
export function isSameServer(
  a: InferenceServerInfo,
  b: InferenceServerInfo,
): boolean {
  return a.jobId === b.jobId;
}

/**
 * Context of one call against a multi-model server.
 * Passed explicitly to everything that talks to the server or writes to its repository.
 */
export interface MultiModelServerContext {
  readonly serverJobId: string;
  /** Base URL of the server's HTTP management API */
  readonly managementUrl: string;
  /** Shared model repository path as seen by this process */
  readonly modelRepositoryPath: string;
}

export interface DeployedModelInfo {
  readonly model: ModelInfo;
  readonly server: InferenceServerInfo;
}

/** A model registered on a multi-model server */
export interface MultiModelDeployment {
  readonly name: string;
  readonly mlflowModelUri: string;
  readonly flavor: string;
  readonly tritonModelPath: string;
}

export interface CreateDeploymentRequest {
  readonly name: string;
  readonly modelUri: string;
  readonly flavor: string;
}

export interface CreatedDeployment {
  readonly name: string;
  readonly flavor: SupportedFlavor;
}

/**
 * Registers models on multi-model servers and lists what they serve.
 */
export interface MultiModelDeploymentClient {
  createDeployment(
    context: MultiModelServerContext,
    request: CreateDeploymentRequest,
  ): Promise<CreatedDeployment>;
  listDeployments(
    context: MultiModelServerContext,
  ): Promise<MultiModelDeployment[]>;
}
