import path from "node:path";
import { fileURLToPath } from "node:url";
import { TagProtocol, TimeInMs } from "@shared";
import dotenv from "dotenv";
import packageJson from "../package.json";

/**
 * Load .env from the repository root so that the backend and its tooling share one file
 */
const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "../../.env"), quiet: true });

const environment = process.env.NODE_ENV?.toLowerCase() ?? "";
const isProduction = ["production", "prod"].includes(environment);
const isDevelopment = !isProduction;

/**
 * Parse a positive integer from an environment variable, falling back to the default
 * when the variable is unset or not a positive integer.
 */
export const parsePositiveInt = (
  envValue: string | undefined,
  defaultValue: number,
): number => {
  const trimmed = envValue?.trim();
  if (!trimmed || !/^\d+$/.test(trimmed)) {
    return defaultValue;
  }
  const value = Number.parseInt(trimmed, 10);
  return value > 0 ? value : defaultValue;
};

/**
 * Parse a comma-separated list, dropping empty entries.
 */
export const parseList = (
  envValue: string | undefined,
  defaultValue: string[],
): string[] => {
  if (!envValue?.trim()) {
    return defaultValue;
  }
  return envValue
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

/**
 * Parse a shared volume reference of the form "<claim>" or "<claim>/<sub-path>".
 * Returns null when no storage is configured.
 */
export const parseVolumeStorage = (
  envValue: string | undefined,
): { claimName: string; subPath?: string } | null => {
  const trimmed = envValue?.trim().replace(/^pvc:\/*/, "");
  if (!trimmed) {
    return null;
  }
  const [claimName, ...rest] = trimmed.split("/");
  const subPath = rest.filter((segment) => segment.length > 0).join("/");
  return subPath ? { claimName, subPath } : { claimName };
};

const getCorsOrigins = (): (string | RegExp)[] => {
  const origins = parseList(process.env.DEPLOYER_API_CORS_ORIGINS, []);
  if (origins.length > 0) {
    return origins;
  }
  // Accept any localhost origin when nothing is configured
  return [/^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/];
};

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");

const mlflowTrackingUri = trimTrailingSlash(
  process.env.MLFLOW_TRACKING_URI?.trim() || "http://localhost:5000",
);

export default {
  api: {
    host: isDevelopment ? "127.0.0.1" : "0.0.0.0",
    port: parsePositiveInt(process.env.DEPLOYER_API_PORT, 9000),
    name: "Inference Deployer API",
    version: process.env.DEPLOYER_VERSION || packageJson.version,
    corsOrigins: getCorsOrigins(),
  },
  controller: {
    namespace:
      process.env.DEPLOYER_CONTROLLER_NAMESPACE || TagProtocol.DefaultNamespace,
    id: process.env.DEPLOYER_CONTROLLER_ID || TagProtocol.DefaultControllerId,
  },
  fabric: {
    kubernetes: {
      namespace: process.env.DEPLOYER_K8S_NAMESPACE || "default",
      kubeconfig: process.env.DEPLOYER_KUBECONFIG,
      loadKubeconfigFromCurrentCluster:
        process.env.DEPLOYER_LOAD_KUBECONFIG_FROM_CURRENT_CLUSTER === "true",
    },
    owner: process.env.DEPLOYER_JOB_OWNER || process.env.USER || "deployer",
    /** When set, job endpoints are reported as https://<job-name>.<domain> */
    ingressDomain: process.env.DEPLOYER_INGRESS_DOMAIN || undefined,
    listPageSize: parsePositiveInt(process.env.DEPLOYER_LIST_PAGE_SIZE, 100),
    presetsFile:
      process.env.DEPLOYER_FABRIC_PRESETS_FILE ||
      path.resolve(__dirname, "../config/presets.json"),
  },
  readiness: {
    timeoutMs: parsePositiveInt(
      process.env.DEPLOYER_READINESS_TIMEOUT_MS,
      10 * TimeInMs.Minute,
    ),
    intervalMs: parsePositiveInt(
      process.env.DEPLOYER_READINESS_INTERVAL_MS,
      100,
    ),
  },
  mlflow: {
    trackingUri: mlflowTrackingUri,
    publicUri: trimTrailingSlash(
      process.env.MLFLOW_PUBLIC_URI?.trim() || mlflowTrackingUri,
    ),
    token: process.env.MLFLOW_TRACKING_TOKEN || undefined,
    /** Secret holding the token that deployed servers authenticate with */
    tokenSecret: {
      name:
        process.env.DEPLOYER_MLFLOW_TOKEN_SECRET?.trim() ||
        "in-job-deployment-auth-token",
      key: process.env.DEPLOYER_MLFLOW_TOKEN_SECRET_KEY?.trim() || "token",
    },
    requestTimeoutMs: parsePositiveInt(
      process.env.DEPLOYER_MLFLOW_REQUEST_TIMEOUT_MS,
      30 * TimeInMs.Second,
    ),
    descriptorCacheSize: parsePositiveInt(
      process.env.DEPLOYER_DESCRIPTOR_CACHE_SIZE,
      256,
    ),
  },
  modelRepository: {
    /** Local mount path of the shared Triton model repository */
    mountPath: process.env.TRITON_MODEL_REPO?.trim() || undefined,
    storage: parseVolumeStorage(process.env.TRITON_MODEL_REPO_STORAGE),
  },
  images: {
    triton: parseList(process.env.DEPLOYER_TRITON_IMAGES, [
      "nvcr.io/nvidia/tritonserver",
    ]),
    github: parseList(process.env.DEPLOYER_GITHUB_IMAGES, [
      "ghcr.io/mlflow/mlflow",
    ]),
    platformRegistry: {
      url: process.env.DEPLOYER_PLATFORM_REGISTRY_URL || undefined,
      token: process.env.DEPLOYER_PLATFORM_REGISTRY_TOKEN || undefined,
    },
  },
  observability: {
    metrics: {
      endpoint: "/metrics",
    },
  },
  debug: isDevelopment,
  production: isProduction,
  environment,
};
