import {
  type InferenceServerType,
  InferenceServerTypeSchema,
  TagProtocol,
} from "@shared";
import { ModelInfoNotFoundError, TagDecodeError } from "@/errors";
import type { ModelInfo } from "./types";

/**
 * Identifies which jobs belong to this orchestrator instance
 */
export interface ControllerIdentity {
  namespace: string;
  id: string;
}

const { Separator, ServerTypeKey, ModelInfoKey, ModelInfoFieldSeparator } =
  TagProtocol;

const SERVER_TYPE_PREFIX = `${ServerTypeKey}${Separator}`;
const MODEL_INFO_PREFIX = `${ModelInfoKey}${Separator}`;

export function ownershipTag(controller: ControllerIdentity): string {
  return `${controller.namespace}${Separator}${controller.id}`;
}

export function serverTypeTag(serverType: InferenceServerType): string {
  return `${SERVER_TYPE_PREFIX}${serverType}`;
}

export function modelInfoTag(
  model: Pick<ModelInfo, "name" | "stage" | "version">,
): string {
  return `${MODEL_INFO_PREFIX}${[model.name, model.stage, model.version].join(
    ModelInfoFieldSeparator,
  )}`;
}

export function encodeServerTags(
  controller: ControllerIdentity,
  serverType?: InferenceServerType,
  model?: Pick<ModelInfo, "name" | "stage" | "version">,
): string[] {
  const tags = [ownershipTag(controller)];
  if (serverType) {
    tags.push(serverTypeTag(serverType));
  }
  if (model) {
    tags.push(modelInfoTag(model));
  }
  return tags;
}

/**
 * Decode the server type from a job's tags.
 *
 * Only the first `server-type::` tag counts: an unknown value there fails the
 * decode even when a later tag would be valid.
 */
export function decodeServerType(tags: readonly string[]): InferenceServerType {
  const tag = tags.find((t) => t.startsWith(SERVER_TYPE_PREFIX));
  if (tag === undefined) {
    throw new TagDecodeError("Job has no server type tag");
  }
  const value = tag.slice(SERVER_TYPE_PREFIX.length);
  const parsed = InferenceServerTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new TagDecodeError(`Unknown server type "${value}"`);
  }
  return parsed.data;
}

/**
 * Decode the `model-info::<name>:<stage>:<version>` tag. First match wins.
 */
export function decodeModelIdentity(tags: readonly string[]): ModelInfo {
  const tag = tags.find((t) => t.startsWith(MODEL_INFO_PREFIX));
  if (tag === undefined) {
    throw new ModelInfoNotFoundError("Job has no model info tag");
  }
  const parts = tag.slice(MODEL_INFO_PREFIX.length).split(ModelInfoFieldSeparator);
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    throw new ModelInfoNotFoundError(`Malformed model info tag "${tag}"`);
  }
  const [name, stage, version] = parts;
  return { name, stage, version };
}
