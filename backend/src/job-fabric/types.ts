import { z } from "zod";

export const JobStatusSchema = z.enum([
  "pending",
  "running",
  "succeeded",
  "failed",
  "cancelled",
]);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = ["pending", "running"];

export const PresetSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  cpu: z.number().positive(),
  memory: z.string().min(1),
  nvidiaGpu: z.number().int().nonnegative().optional(),
});
export type Preset = z.infer<typeof PresetSchema>;

export const PresetsFileSchema = z.object({
  presets: z.array(PresetSchema).min(1),
});

/** A shared volume mounted into the job container */
export interface JobVolumeMount {
  claimName: string;
  subPath?: string;
  mountPath: string;
  readOnly: boolean;
}

/** An environment value read from a platform secret when the job starts */
export interface JobSecretRef {
  secretName: string;
  key: string;
  /** Start the job without the variable when the secret is missing */
  optional: boolean;
}

export interface JobContainer {
  image: string;
  /** Overrides the image entrypoint */
  command?: string[];
  args?: string[];
  env: Record<string, string>;
  secretEnv: Record<string, JobSecretRef>;
  /** Port exposed through the job's HTTP endpoint */
  httpPort?: number;
  /** Whether the HTTP endpoint requires platform authentication */
  httpAuth: boolean;
  volumes: JobVolumeMount[];
  /** Mount an in-memory /dev/shm */
  shm: boolean;
}

export interface JobSubmission {
  name: string;
  presetName: string;
  tags: string[];
  container: JobContainer;
  description?: string;
}

export interface JobDescription {
  id: string;
  name: string | null;
  tags: string[];
  status: JobStatus;
  owner: string;
  createdAt: Date;
  presetName: string;
  container: JobContainer;
  /** Externally reachable endpoint, when the job exposes an HTTP port */
  httpUrl: string | null;
  /** Hostname reachable from inside the cluster */
  internalHostname: string | null;
}

export interface ListJobsFilter {
  statuses?: readonly JobStatus[];
  /** Jobs must carry every one of these tags */
  tags?: readonly string[];
}

/**
 * The compute fabric jobs run on.
 */
export interface JobFabric {
  /** @throws FabricNameConflictError when an active job already uses the name */
  submitJob(submission: JobSubmission): Promise<JobDescription>;
  /** @throws FabricJobNotFoundError */
  getJob(jobId: string): Promise<JobDescription>;
  /** Paged listing consumed as a sequential feed */
  listJobs(filter?: ListJobsFilter): AsyncIterable<JobDescription>;
  /** @throws FabricJobNotFoundError */
  killJob(jobId: string): Promise<void>;
  listPresets(): Promise<Preset[]>;
}

export class FabricError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FabricNameConflictError extends FabricError {
  constructor(
    readonly jobName: string,
    options?: { cause?: unknown },
  ) {
    super(`A job named ${jobName} already exists`, options);
  }
}

export class FabricJobNotFoundError extends FabricError {
  constructor(
    readonly jobId: string,
    options?: { cause?: unknown },
  ) {
    super(`Job ${jobId} not found`, options);
  }
}

export function matchesFilter(
  job: JobDescription,
  { statuses, tags }: ListJobsFilter,
): boolean {
  if (statuses && !statuses.includes(job.status)) {
    return false;
  }
  if (tags && !tags.every((tag) => job.tags.includes(tag))) {
    return false;
  }
  return true;
}
