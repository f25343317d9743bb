import { setTimeout as sleep } from "node:timers/promises";
import { DeploymentCancelledError, ReadinessTimeoutError } from "@/errors";
import type { JobDescription, JobFabric } from "@/job-fabric";
import logger from "@/logging";

export interface ReadinessOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Poll a job until it leaves the pending state.
 *
 * A job that leaves pending by failing is still returned: callers inspect the
 * final status. Whether the job's HTTP endpoint answers is not checked.
 *
 * @throws ReadinessTimeoutError when the job is still pending after `timeoutMs`
 * @throws DeploymentCancelledError when `signal` aborts
 */
export async function waitForJobReady(
  fabric: JobFabric,
  jobId: string,
  { timeoutMs, intervalMs, signal }: ReadinessOptions,
): Promise<JobDescription> {
  const deadline = Date.now() + timeoutMs;
  let jobName: string | undefined;

  for (;;) {
    if (signal?.aborted) {
      throw new DeploymentCancelledError("Deployment was cancelled", {
        jobId,
        deploymentName: jobName,
      });
    }

    const job = await fabric.getJob(jobId);
    jobName = job.name ?? undefined;
    if (job.status !== "pending") {
      logger.debug({ jobId, status: job.status }, "Job left pending state");
      return job;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ReadinessTimeoutError(
        `Job ${jobName ?? jobId} did not start within ${Math.round(timeoutMs / 1000)}s`,
        { jobId, deploymentName: jobName },
      );
    }

    try {
      await sleep(Math.min(intervalMs, remaining), undefined, { signal });
    } catch (error) {
      throw new DeploymentCancelledError("Deployment was cancelled", {
        jobId,
        deploymentName: jobName,
      }, { cause: error });
    }
  }
}
