import { DeploymentCancelledError, ReadinessTimeoutError } from "@/errors";
import { describe, expect, test } from "@/test";
import { waitForJobReady } from "./readiness";

const options = { timeoutMs: 1000, intervalMs: 1 };

describe("waitForJobReady", () => {
  test("returns once the job leaves pending", async ({ fabric }) => {
    fabric.pendingPolls = 3;
    const job = fabric.addJob({ name: "svc-a", status: "pending" });

    const ready = await waitForJobReady(fabric, job.id, options);

    expect(ready.status).toBe("running");
  });

  test("reports a job that failed right away as no longer pending", async ({
    fabric,
  }) => {
    fabric.settledStatus = "failed";
    const job = fabric.addJob({ name: "svc-a", status: "pending" });

    const ready = await waitForJobReady(fabric, job.id, options);

    expect(ready.status).toBe("failed");
  });

  test("times out when the job stays pending", async ({ fabric }) => {
    fabric.pendingPolls = Number.POSITIVE_INFINITY;
    const job = fabric.addJob({ name: "svc-a", status: "pending" });

    const error = await waitForJobReady(fabric, job.id, {
      timeoutMs: 20,
      intervalMs: 5,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReadinessTimeoutError);
    expect(error).toMatchObject({ jobId: job.id, deploymentName: "svc-a" });
  });

  test("stops when the signal aborts", async ({ fabric }) => {
    fabric.pendingPolls = Number.POSITIVE_INFINITY;
    const job = fabric.addJob({ name: "svc-a", status: "pending" });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(
      waitForJobReady(fabric, job.id, {
        timeoutMs: 60_000,
        intervalMs: 5,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(DeploymentCancelledError);
  });

  test("does not poll when the signal is already aborted", async ({
    fabric,
  }) => {
    const job = fabric.addJob({ name: "svc-a", status: "pending" });
    const controller = new AbortController();
    controller.abort();

    await expect(
      waitForJobReady(fabric, job.id, { ...options, signal: controller.signal }),
    ).rejects.toBeInstanceOf(DeploymentCancelledError);
    expect(fabric.jobs.get(job.id)?.status).toBe("pending");
  });
});
