/**
 * Prometheus metrics for deployments and fleet discovery.
 *
 * Failure rate per backend:
 * rate(inference_deployments_total{outcome!="success"}[1h])
 */

import client from "prom-client";
import logger from "@/logging";

export type DeploymentBackend =
  | "single_model"
  | "multi_model_server"
  | "multi_model_registration";

let deploymentsTotal: client.Counter<string> | undefined;
let deploymentDuration: client.Histogram<string> | undefined;
let discoverySkippedTotal: client.Counter<string> | undefined;

/**
 * Register the deployment metrics. Safe to call more than once.
 */
export function initializeDeploymentMetrics(): void {
  if (deploymentsTotal && deploymentDuration && discoverySkippedTotal) {
    return;
  }

  deploymentsTotal = new client.Counter({
    name: "inference_deployments_total",
    help: "Deployments attempted, by backend and outcome",
    labelNames: ["backend", "outcome"],
  });

  deploymentDuration = new client.Histogram({
    name: "inference_deployment_duration_seconds",
    help: "Time from submission until a deployment succeeded or failed",
    labelNames: ["backend", "outcome"],
    buckets: [1, 5, 15, 30, 60, 120, 300, 600],
  });

  discoverySkippedTotal = new client.Counter({
    name: "inference_discovery_skipped_jobs_total",
    help: "Jobs excluded from discovery because their tags or environment could not be decoded",
    labelNames: ["reason"],
  });

  logger.info("Deployment metrics initialized");
}

/**
 * Reports the outcome of one deployment call.
 * `outcome` is "success" or the error code of the failure.
 */
export function reportDeployment(params: {
  backend: DeploymentBackend;
  outcome: string;
  durationSeconds: number;
}): void {
  if (!deploymentsTotal || !deploymentDuration) {
    logger.debug("Deployment metrics not initialized, skipping reporting");
    return;
  }

  const labels = { backend: params.backend, outcome: params.outcome };
  deploymentsTotal.inc(labels);
  if (params.durationSeconds > 0) {
    deploymentDuration.observe(labels, params.durationSeconds);
  }
}

export function reportDiscoverySkip(reason: string): void {
  if (!discoverySkippedTotal) {
    logger.debug("Deployment metrics not initialized, skipping reporting");
    return;
  }
  discoverySkippedTotal.inc({ reason });
}
