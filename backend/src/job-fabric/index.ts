import * as fs from "node:fs";
import * as k8s from "@kubernetes/client-node";
import config from "@/config";
import logger from "@/logging";
import { K8sJobFabric } from "./k8s-job-fabric";

export * from "./k8s-job-fabric";
export * from "./types";

const {
  fabric: {
    kubernetes: { namespace, kubeconfig, loadKubeconfigFromCurrentCluster },
    owner,
    ingressDomain,
    listPageSize,
    presetsFile,
  },
} = config;

/**
 * Validates kubeconfig file and throws descriptive errors for various failure scenarios
 */
export function validateKubeconfig(path?: string) {
  if (!path) {
    return;
  }

  if (!fs.existsSync(path)) {
    throw new Error(`Kubeconfig file not found at ${path}`);
  }

  const content = fs.readFileSync(path, "utf8");

  // Try parsing with the official Kubernetes parser
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromString(content);
  } catch {
    throw new Error("Malformed kubeconfig: could not parse YAML");
  }

  const [cluster] = kc.clusters;
  if (!cluster) {
    throw new Error("Invalid kubeconfig: clusters section missing");
  }
  if (!cluster.name || !cluster.server) {
    throw new Error(
      "Invalid kubeconfig: cluster entry is missing required fields",
    );
  }
  if (kc.contexts.length === 0) {
    throw new Error("Invalid kubeconfig: contexts section missing");
  }
  if (kc.users.length === 0) {
    throw new Error("Invalid kubeconfig: users section missing");
  }

  logger.info("Custom kubeconfig validated successfully");
}

/**
 * Load the Kubernetes configuration the same way kubectl would, unless the
 * process runs inside the cluster or an explicit kubeconfig is configured.
 */
export function loadKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();

  // Treat an empty string as unset
  const kubeconfigPath = kubeconfig?.trim() || undefined;

  if (loadKubeconfigFromCurrentCluster) {
    kc.loadFromCluster();
    logger.info("Loaded kubeconfig from current cluster");
  } else if (kubeconfigPath) {
    validateKubeconfig(kubeconfigPath);
    kc.loadFromFile(kubeconfigPath);
    logger.info(`Loaded kubeconfig from ${kubeconfigPath}`);
  } else {
    kc.loadFromDefault();
    logger.info("No kubeconfig provided, using default kubeconfig");
  }

  return kc;
}

export function createJobFabric(): K8sJobFabric {
  const kc = loadKubeConfig();
  return new K8sJobFabric({
    appsApi: kc.makeApiClient(k8s.AppsV1Api),
    coreApi: kc.makeApiClient(k8s.CoreV1Api),
    networkingApi: kc.makeApiClient(k8s.NetworkingV1Api),
    namespace,
    owner,
    ingressDomain,
    pageSize: listPageSize,
    presetsFile,
  });
}
