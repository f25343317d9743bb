/**
 * Failure taxonomy of the deployment orchestrator.
 *
 * Every error carries a short user-facing message plus the job id and
 * deployment name where they are known, so that callers can act on it.
 */

export type DeploymentErrorCode =
  | "structural_decode"
  | "model_info_not_found"
  | "model_not_found"
  | "name_collision"
  | "unsupported_flavor"
  | "server_resolution_failed"
  | "submission_failed"
  | "readiness_timeout"
  | "deployment_cancelled"
  | "deployment_mismatch"
  | "precondition_violation"
  | "backend_failure";

export interface DeploymentErrorContext {
  jobId?: string;
  deploymentName?: string;
}

export abstract class DeploymentError extends Error {
  abstract readonly code: DeploymentErrorCode;
  readonly jobId?: string;
  readonly deploymentName?: string;

  constructor(
    message: string,
    context: DeploymentErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.jobId = context.jobId;
    this.deploymentName = context.deploymentName;
  }

  /** Fields worth attaching to a log line */
  get logContext(): Record<string, string> {
    const fields: Record<string, string> = { code: this.code };
    if (this.jobId) fields.jobId = this.jobId;
    if (this.deploymentName) fields.deploymentName = this.deploymentName;
    return fields;
  }
}

/** A tag or environment contract of a job is violated */
export class StructuralDecodeError extends DeploymentError {
  readonly code: DeploymentErrorCode = "structural_decode";
}

/** No usable server-type tag */
export class TagDecodeError extends StructuralDecodeError {}

export class ModelInfoNotFoundError extends StructuralDecodeError {
  readonly code = "model_info_not_found";
}

/** The registry holds no such model, stage or version */
export class ModelNotFoundError extends DeploymentError {
  readonly code = "model_not_found";
}

export class NameCollisionError extends DeploymentError {
  readonly code = "name_collision";

  constructor(
    deploymentName: string,
    context: DeploymentErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(
      `Deployment with name ${deploymentName} already exists`,
      { ...context, deploymentName },
      options,
    );
  }
}

export class UnsupportedFlavorError extends DeploymentError {
  readonly code = "unsupported_flavor";
}

export class ServerResolutionError extends DeploymentError {
  readonly code = "server_resolution_failed";
}

export class SubmissionError extends DeploymentError {
  readonly code = "submission_failed";
}

export class ReadinessTimeoutError extends DeploymentError {
  readonly code = "readiness_timeout";
}

export class DeploymentCancelledError extends DeploymentError {
  readonly code = "deployment_cancelled";
}

/** The multi-model server reported a different deployment than requested */
export class DeploymentMismatchError extends DeploymentError {
  readonly code = "deployment_mismatch";
}

export class PreconditionViolationError extends DeploymentError {
  readonly code = "precondition_violation";
}

/** Catch-all for failures of the fabric, registry or model servers */
export class BackendError extends DeploymentError {
  readonly code = "backend_failure";
}

export function isDeploymentError(error: unknown): error is DeploymentError {
  return error instanceof DeploymentError;
}

/**
 * Message of an unknown thrown value, for logging.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
