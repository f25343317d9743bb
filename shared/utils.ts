import { DeploymentNameRules } from "./consts";

const DEPLOYMENT_NAME_PATTERN = /^[a-z](?:-?[a-z0-9])*$/;

/**
 * Validate a job/deployment name.
 * Returns a user-facing reason when the name is rejected, null otherwise.
 */
export function validateDeploymentName(name: string): string | null {
  const { MinLength, MaxLength } = DeploymentNameRules;
  if (name.length < MinLength || name.length > MaxLength) {
    return `Name must be between ${MinLength} and ${MaxLength} characters long`;
  }
  if (!DEPLOYMENT_NAME_PATTERN.test(name)) {
    return "Name may contain only lowercase letters, digits and single hyphens between them, and must start with a letter";
  }
  return null;
}

export function isValidDeploymentName(name: string): boolean {
  return validateDeploymentName(name) === null;
}

/**
 * Default deployment name for a model stage, e.g. "fraud-detector-production".
 */
export function defaultDeploymentName(modelName: string, stage: string): string {
  return `${modelName}-${stage}`.toLowerCase().replace(/[/_]/g, "-");
}

/**
 * Format a model identity the way it is shown in listings ("name:stage:version").
 */
export function formatModelIdentity(model: {
  name: string;
  stage: string;
  version: string;
}): string {
  return `${model.name}:${model.stage}:${model.version}`;
}
