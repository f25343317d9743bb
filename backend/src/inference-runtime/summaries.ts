import { formatModelIdentity, NO_NAME_PLACEHOLDER } from "@shared";
import type {
  DeployedModelSummary,
  InferenceServerSummary,
} from "@/types/inference";
import type {
  DeployedModelInfo,
  InferenceServerInfo,
  ModelStage,
} from "./types";

export function toServerSummary(
  server: InferenceServerInfo,
): InferenceServerSummary {
  const { job } = server;
  return {
    serverName: job.name ?? NO_NAME_PLACEHOLDER,
    jobId: server.jobId,
    serverType: server.type,
    status: job.status,
    preset: job.presetName,
    owner: job.owner,
    createdAt: job.createdAt.toISOString(),
    endpointUrl: job.httpUrl,
  };
}

export function toDeployedModelSummary({
  model,
  server,
}: DeployedModelInfo): DeployedModelSummary {
  return {
    model: formatModelIdentity(model),
    serverType: server.type,
    serverName: server.job.name ?? NO_NAME_PLACEHOLDER,
    serverJobId: server.jobId,
    createdAt: server.job.createdAt.toISOString(),
    endpointUrl: server.job.httpUrl,
  };
}

export function toRegisteredModel({ name, stage, version, registry }: ModelStage) {
  return {
    name,
    stage,
    version,
    createdAt: registry.createdAt.toISOString(),
    uri: registry.uri,
    link: registry.link,
    publicLink: registry.publicLink,
    source: registry.source,
    flavors: [...registry.flavors],
  };
}
