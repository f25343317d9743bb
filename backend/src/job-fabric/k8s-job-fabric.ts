import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import type * as k8s from "@kubernetes/client-node";
import { z } from "zod";
import logger from "@/logging";
import {
  FabricError,
  FabricJobNotFoundError,
  FabricNameConflictError,
  type JobContainer,
  type JobDescription,
  type JobFabric,
  type JobSecretRef,
  type JobStatus,
  type JobSubmission,
  type JobVolumeMount,
  type ListJobsFilter,
  matchesFilter,
  type Preset,
  PresetsFileSchema,
} from "./types";

export const K8sLabel = {
  ManagedBy: "app.kubernetes.io/managed-by",
  JobId: "inference-deployer/job-id",
  JobName: "inference-deployer/job-name",
} as const;

export const K8sAnnotation = {
  Tags: "inference-deployer/tags",
  Preset: "inference-deployer/preset",
  Owner: "inference-deployer/owner",
  HttpAuth: "inference-deployer/http-auth",
  Description: "inference-deployer/description",
} as const;

export const MANAGED_BY = "inference-deployer";

const CONTAINER_NAME = "main";
const SHM_VOLUME_NAME = "dshm";

/**
 * Container waiting reasons that will not resolve by themselves
 */
const FAILURE_WAITING_REASONS = [
  "CrashLoopBackOff",
  "ImagePullBackOff",
  "ErrImagePull",
  "ErrImageNeverPull",
  "CreateContainerConfigError",
  "CreateContainerError",
  "RunContainerError",
  "InvalidImageName",
];

const TagsAnnotationSchema = z.array(z.string());

export type K8sAppsApi = Pick<
  k8s.AppsV1Api,
  | "createNamespacedDeployment"
  | "listNamespacedDeployment"
  | "deleteNamespacedDeployment"
>;

export type K8sCoreApi = Pick<
  k8s.CoreV1Api,
  | "createNamespacedService"
  | "deleteNamespacedService"
  | "listNamespacedPod"
>;

export type K8sNetworkingApi = Pick<
  k8s.NetworkingV1Api,
  "createNamespacedIngress" | "deleteNamespacedIngress"
>;

export interface K8sJobFabricOptions {
  appsApi: K8sAppsApi;
  coreApi: K8sCoreApi;
  networkingApi: K8sNetworkingApi;
  namespace: string;
  owner: string;
  presetsFile: string;
  pageSize: number;
  /** Jobs that do not require auth are published as `<name>.<ingressDomain>` */
  ingressDomain?: string;
}

/**
 * K8s client errors can have either `statusCode` or `code` property set.
 */
function isK8sStatusError(error: unknown, status: number): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    (("statusCode" in error && error.statusCode === status) ||
      ("code" in error && error.code === status))
  );
}

/**
 * Runs every job as a single-replica Deployment, plus a Service when the job exposes an HTTP port.
 *
 * Job ids, names and the orchestrator's tags live in labels and annotations, so the
 * cluster itself is the only record of what is running.
 *
 * The cluster has no authenticating proxy, so an endpoint that requires auth stays
 * reachable only from inside the cluster. Only endpoints without auth get an Ingress.
 */
export class K8sJobFabric implements JobFabric {
  private presets: Promise<Preset[]> | null = null;

  constructor(private readonly options: K8sJobFabricOptions) {}

  async submitJob(submission: JobSubmission): Promise<JobDescription> {
    const { appsApi, coreApi, networkingApi, namespace, owner } =
      this.options;
    const preset = await this.getPreset(submission.presetName);
    const jobId = `job-${randomUUID()}`;
    const deployment = this.buildDeployment(jobId, submission, preset);

    let created: k8s.V1Deployment;
    try {
      created = await appsApi.createNamespacedDeployment({
        namespace,
        body: deployment,
      });
    } catch (error) {
      if (isK8sStatusError(error, 409)) {
        throw new FabricNameConflictError(submission.name, { cause: error });
      }
      throw new FabricError(
        `Failed to create deployment ${submission.name}`,
        { cause: error },
      );
    }

    const { httpPort, httpAuth } = submission.container;
    if (httpPort !== undefined) {
      try {
        await this.replaceLeftover(
          "service",
          submission.name,
          () =>
            coreApi.createNamespacedService({
              namespace,
              body: this.buildService(jobId, submission.name, httpPort),
            }),
          () =>
            coreApi.deleteNamespacedService({
              name: submission.name,
              namespace,
            }),
        );
        if (this.isPublished(httpAuth)) {
          await this.replaceLeftover(
            "ingress",
            submission.name,
            () =>
              networkingApi.createNamespacedIngress({
                namespace,
                body: this.buildIngress(jobId, submission.name, httpPort),
              }),
            () =>
              networkingApi.deleteNamespacedIngress({
                name: submission.name,
                namespace,
              }),
          );
        }
      } catch (error) {
        await this.rollbackSubmission(submission.name);
        throw error;
      }
    }

    logger.info(
      { jobId, jobName: submission.name, namespace, owner },
      "Submitted job",
    );

    const job = this.toJobDescription(created, []);
    if (!job) {
      throw new FabricError(
        `Created deployment ${submission.name} carries no job id`,
      );
    }
    return job;
  }

  async getJob(jobId: string): Promise<JobDescription> {
    const deployment = await this.findDeployment(jobId);
    const pods = await this.listPods(`${K8sLabel.JobId}=${jobId}`);
    const job = this.toJobDescription(deployment, pods);
    if (!job) {
      throw new FabricJobNotFoundError(jobId);
    }
    return job;
  }

  async *listJobs(filter: ListJobsFilter = {}): AsyncGenerator<JobDescription> {
    const { appsApi, namespace, pageSize } = this.options;
    let continueToken: string | undefined;

    do {
      const page = await appsApi.listNamespacedDeployment({
        namespace,
        labelSelector: `${K8sLabel.ManagedBy}=${MANAGED_BY}`,
        limit: pageSize,
        _continue: continueToken,
      });

      const podsByJobId = new Map<string, k8s.V1Pod[]>();
      if (page.items.length > 0) {
        for (const pod of await this.listPods(
          `${K8sLabel.ManagedBy}=${MANAGED_BY}`,
        )) {
          const jobId = pod.metadata?.labels?.[K8sLabel.JobId];
          if (jobId) {
            podsByJobId.set(jobId, [...(podsByJobId.get(jobId) ?? []), pod]);
          }
        }
      }

      for (const deployment of page.items) {
        const jobId = deployment.metadata?.labels?.[K8sLabel.JobId];
        const job = jobId
          ? this.toJobDescription(deployment, podsByJobId.get(jobId) ?? [])
          : null;
        if (job && matchesFilter(job, filter)) {
          yield job;
        }
      }

      continueToken = page.metadata?._continue || undefined;
    } while (continueToken);
  }

  async killJob(jobId: string): Promise<void> {
    const { appsApi, coreApi, networkingApi, namespace } = this.options;
    const deployment = await this.findDeployment(jobId);
    const name = deployment.metadata?.name;
    if (!name) {
      throw new FabricJobNotFoundError(jobId);
    }

    try {
      await appsApi.deleteNamespacedDeployment({ name, namespace });
    } catch (error) {
      if (isK8sStatusError(error, 404)) {
        throw new FabricJobNotFoundError(jobId, { cause: error });
      }
      throw new FabricError(`Failed to delete deployment ${name}`, {
        cause: error,
      });
    }

    // Jobs without an HTTP port have no service, jobs requiring auth no ingress
    await this.deleteIfPresent("service", name, () =>
      coreApi.deleteNamespacedService({ name, namespace }),
    );
    await this.deleteIfPresent("ingress", name, () =>
      networkingApi.deleteNamespacedIngress({ name, namespace }),
    );

    logger.info({ jobId, jobName: name, namespace }, "Killed job");
  }

  private isPublished(httpAuth: boolean): boolean {
    return this.options.ingressDomain !== undefined && !httpAuth;
  }

  /**
   * Create an object that shares the job's name. One left behind by a killed job
   * still routes to the old job id, so it is deleted and created again.
   */
  private async replaceLeftover(
    kind: string,
    name: string,
    create: () => Promise<unknown>,
    remove: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await create();
      return;
    } catch (error) {
      if (!isK8sStatusError(error, 409)) {
        throw new FabricError(`Failed to create ${kind} ${name}`, {
          cause: error,
        });
      }
    }

    logger.info({ kind, name }, "Replacing leftover object of a killed job");
    try {
      await this.deleteIfPresent(kind, name, remove);
      await create();
    } catch (error) {
      if (error instanceof FabricError) {
        throw error;
      }
      throw new FabricError(`Failed to replace ${kind} ${name}`, {
        cause: error,
      });
    }
  }

  private async deleteIfPresent(
    kind: string,
    name: string,
    remove: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await remove();
    } catch (error) {
      if (!isK8sStatusError(error, 404)) {
        throw new FabricError(`Failed to delete ${kind} ${name}`, {
          cause: error,
        });
      }
    }
  }

  /**
   * Remove what a failed submission created so the name can be used again.
   */
  private async rollbackSubmission(name: string): Promise<void> {
    const { appsApi, coreApi, namespace } = this.options;
    try {
      await this.deleteIfPresent("service", name, () =>
        coreApi.deleteNamespacedService({ name, namespace }),
      );
      await this.deleteIfPresent("deployment", name, () =>
        appsApi.deleteNamespacedDeployment({ name, namespace }),
      );
    } catch (error) {
      logger.error(
        { err: error, jobName: name, namespace },
        "Failed to roll back a partial submission",
      );
    }
  }

  listPresets(): Promise<Preset[]> {
    if (!this.presets) {
      this.presets = this.loadPresets().catch((error: unknown) => {
        this.presets = null;
        throw error;
      });
    }
    return this.presets;
  }

  private async loadPresets(): Promise<Preset[]> {
    const { presetsFile } = this.options;
    const content = await fs.readFile(presetsFile, "utf8");
    const parsed = PresetsFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new FabricError(
        `Invalid presets file ${presetsFile}: ${parsed.error.message}`,
      );
    }
    return parsed.data.presets;
  }

  private async getPreset(name: string): Promise<Preset> {
    const preset = (await this.listPresets()).find((p) => p.name === name);
    if (!preset) {
      throw new FabricError(`Unknown preset ${name}`);
    }
    return preset;
  }

  private async findDeployment(jobId: string): Promise<k8s.V1Deployment> {
    const { appsApi, namespace } = this.options;
    const list = await appsApi.listNamespacedDeployment({
      namespace,
      labelSelector: `${K8sLabel.ManagedBy}=${MANAGED_BY},${K8sLabel.JobId}=${jobId}`,
    });
    const [deployment] = list.items;
    if (!deployment) {
      throw new FabricJobNotFoundError(jobId);
    }
    return deployment;
  }

  private async listPods(labelSelector: string): Promise<k8s.V1Pod[]> {
    const { coreApi, namespace } = this.options;
    const pods = await coreApi.listNamespacedPod({ namespace, labelSelector });
    return pods.items;
  }

  private buildDeployment(
    jobId: string,
    submission: JobSubmission,
    preset: Preset,
  ): k8s.V1Deployment {
    const { container, name } = submission;
    const labels = {
      [K8sLabel.ManagedBy]: MANAGED_BY,
      [K8sLabel.JobId]: jobId,
      [K8sLabel.JobName]: name,
    };

    const limits: Record<string, string> = { memory: preset.memory };
    if (preset.nvidiaGpu) {
      limits["nvidia.com/gpu"] = String(preset.nvidiaGpu);
    }

    const volumes: k8s.V1Volume[] = container.volumes.map((volume, index) => ({
      name: `shared-${index}`,
      persistentVolumeClaim: {
        claimName: volume.claimName,
        readOnly: volume.readOnly,
      },
    }));
    const volumeMounts: k8s.V1VolumeMount[] = container.volumes.map(
      (volume, index) => ({
        name: `shared-${index}`,
        mountPath: volume.mountPath,
        subPath: volume.subPath,
        readOnly: volume.readOnly,
      }),
    );
    if (container.shm) {
      volumes.push({ name: SHM_VOLUME_NAME, emptyDir: { medium: "Memory" } });
      volumeMounts.push({ name: SHM_VOLUME_NAME, mountPath: "/dev/shm" });
    }

    const annotations: Record<string, string> = {
      [K8sAnnotation.Tags]: JSON.stringify(submission.tags),
      [K8sAnnotation.Preset]: preset.name,
      [K8sAnnotation.Owner]: this.options.owner,
      [K8sAnnotation.HttpAuth]: String(container.httpAuth),
    };
    if (submission.description) {
      annotations[K8sAnnotation.Description] = submission.description;
    }

    return {
      apiVersion: "apps/v1",
      kind: "Deployment",
      metadata: { name, labels, annotations },
      spec: {
        replicas: 1,
        selector: { matchLabels: { [K8sLabel.JobId]: jobId } },
        template: {
          metadata: { labels },
          spec: {
            restartPolicy: "Always",
            containers: [
              {
                name: CONTAINER_NAME,
                image: container.image,
                command: container.command,
                args: container.args,
                env: [
                  ...Object.entries(container.env).map(
                    ([envName, value]): k8s.V1EnvVar => ({
                      name: envName,
                      value,
                    }),
                  ),
                  ...Object.entries(container.secretEnv).map(
                    ([envName, ref]): k8s.V1EnvVar => ({
                      name: envName,
                      valueFrom: {
                        secretKeyRef: {
                          name: ref.secretName,
                          key: ref.key,
                          optional: ref.optional,
                        },
                      },
                    }),
                  ),
                ],
                ports:
                  container.httpPort !== undefined
                    ? [{ name: "http", containerPort: container.httpPort }]
                    : undefined,
                resources: {
                  requests: { cpu: String(preset.cpu), memory: preset.memory },
                  limits,
                },
                volumeMounts,
              },
            ],
            volumes,
          },
        },
      },
    };
  }

  private buildService(
    jobId: string,
    name: string,
    httpPort: number,
  ): k8s.V1Service {
    return {
      apiVersion: "v1",
      kind: "Service",
      metadata: {
        name,
        labels: { [K8sLabel.ManagedBy]: MANAGED_BY, [K8sLabel.JobId]: jobId },
      },
      spec: {
        type: "ClusterIP",
        selector: { [K8sLabel.JobId]: jobId },
        ports: [{ name: "http", port: httpPort, targetPort: httpPort }],
      },
    };
  }

  private buildIngress(
    jobId: string,
    name: string,
    httpPort: number,
  ): k8s.V1Ingress {
    return {
      apiVersion: "networking.k8s.io/v1",
      kind: "Ingress",
      metadata: {
        name,
        labels: { [K8sLabel.ManagedBy]: MANAGED_BY, [K8sLabel.JobId]: jobId },
      },
      spec: {
        rules: [
          {
            host: `${name}.${this.options.ingressDomain}`,
            http: {
              paths: [
                {
                  path: "/",
                  pathType: "Prefix",
                  backend: { service: { name, port: { number: httpPort } } },
                },
              ],
            },
          },
        ],
      },
    };
  }

  private toJobDescription(
    deployment: k8s.V1Deployment,
    pods: k8s.V1Pod[],
  ): JobDescription | null {
    const metadata = deployment.metadata;
    const jobId = metadata?.labels?.[K8sLabel.JobId];
    if (!metadata || !jobId) {
      return null;
    }
    const annotations = metadata.annotations ?? {};
    const name = metadata.labels?.[K8sLabel.JobName] ?? metadata.name ?? null;
    const container = this.toJobContainer(deployment, annotations);

    const internalHostname =
      container.httpPort !== undefined && metadata.name
        ? `${metadata.name}.${this.options.namespace}.svc.cluster.local`
        : null;
    let httpUrl: string | null = null;
    if (internalHostname && metadata.name) {
      httpUrl = this.isPublished(container.httpAuth)
        ? `https://${metadata.name}.${this.options.ingressDomain}`
        : `http://${internalHostname}:${container.httpPort}`;
    }

    return {
      id: jobId,
      name,
      tags: parseTagsAnnotation(annotations[K8sAnnotation.Tags]),
      status: deriveJobStatus(deployment, pods),
      owner: annotations[K8sAnnotation.Owner] ?? "",
      createdAt: metadata.creationTimestamp ?? new Date(0),
      presetName: annotations[K8sAnnotation.Preset] ?? "",
      container,
      httpUrl,
      internalHostname,
    };
  }

  private toJobContainer(
    deployment: k8s.V1Deployment,
    annotations: Record<string, string>,
  ): JobContainer {
    const podSpec = deployment.spec?.template.spec;
    const container = podSpec?.containers.find(
      (c) => c.name === CONTAINER_NAME,
    );
    const claims = new Map<string, string>();
    for (const volume of podSpec?.volumes ?? []) {
      if (volume.persistentVolumeClaim) {
        claims.set(volume.name, volume.persistentVolumeClaim.claimName);
      }
    }

    const env: Record<string, string> = {};
    const secretEnv: Record<string, JobSecretRef> = {};
    for (const variable of container?.env ?? []) {
      const secretKeyRef = variable.valueFrom?.secretKeyRef;
      if (variable.value !== undefined) {
        env[variable.name] = variable.value;
      } else if (secretKeyRef?.name) {
        secretEnv[variable.name] = {
          secretName: secretKeyRef.name,
          key: secretKeyRef.key,
          optional: secretKeyRef.optional ?? false,
        };
      }
    }

    const volumes: JobVolumeMount[] = [];
    let shm = false;
    for (const mount of container?.volumeMounts ?? []) {
      if (mount.name === SHM_VOLUME_NAME) {
        shm = true;
        continue;
      }
      const claimName = claims.get(mount.name);
      if (claimName) {
        volumes.push({
          claimName,
          subPath: mount.subPath,
          mountPath: mount.mountPath,
          readOnly: mount.readOnly ?? false,
        });
      }
    }

    return {
      image: container?.image ?? "",
      command: container?.command,
      args: container?.args,
      env,
      secretEnv,
      httpPort: container?.ports?.[0]?.containerPort,
      httpAuth: annotations[K8sAnnotation.HttpAuth] === "true",
      volumes,
      shm,
    };
  }
}

export function parseTagsAnnotation(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  try {
    const parsed = TagsAnnotationSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : [];
  } catch (error) {
    logger.warn({ err: error, value }, "Malformed job tags annotation");
    return [];
  }
}

/**
 * Map a Deployment and its pods onto the fabric's job status.
 */
export function deriveJobStatus(
  deployment: k8s.V1Deployment,
  pods: k8s.V1Pod[],
): JobStatus {
  if (deployment.metadata?.deletionTimestamp) {
    return "cancelled";
  }
  if ((deployment.status?.availableReplicas ?? 0) > 0) {
    return "running";
  }

  const progressDeadlineExceeded = deployment.status?.conditions?.some(
    (condition) =>
      condition.type === "Progressing" &&
      condition.status === "False" &&
      condition.reason === "ProgressDeadlineExceeded",
  );
  if (progressDeadlineExceeded) {
    return "failed";
  }

  for (const pod of pods) {
    if (pod.status?.phase === "Failed") {
      return "failed";
    }
    for (const containerStatus of pod.status?.containerStatuses ?? []) {
      const waitingReason = containerStatus.state?.waiting?.reason;
      if (waitingReason && FAILURE_WAITING_REASONS.includes(waitingReason)) {
        return "failed";
      }
    }
  }

  return "pending";
}
