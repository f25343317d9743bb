import { ApiError, ApiErrorTypeSchema } from "@shared";
import { z } from "zod";
import type { DeploymentError, DeploymentErrorCode } from "@/errors";

export { ApiError, ApiErrorTypeSchema };

export type ErrorResponseSchema<T extends z.infer<typeof ApiErrorTypeSchema>> =
  {
    error: {
      message: string;
      type: T;
    };
  };

export const generateErrorResponseSchema = <
  T extends z.infer<typeof ApiErrorTypeSchema>,
>(
  errorType: T,
) =>
  z.object({
    error: z.object({
      message: z.string(),
      type: z.literal(errorType),
    }),
  });

export const ErrorResponsesSchema = {
  400: generateErrorResponseSchema("api_validation_error"),
  404: generateErrorResponseSchema("api_not_found_error"),
  409: generateErrorResponseSchema("api_conflict_error"),
  422: generateErrorResponseSchema("api_unprocessable_entity_error"),
  500: generateErrorResponseSchema("api_internal_server_error"),
  502: generateErrorResponseSchema("api_bad_gateway_error"),
  503: generateErrorResponseSchema("api_service_unavailable_error"),
  504: generateErrorResponseSchema("api_gateway_timeout_error"),
};

export const constructResponseSchema = <T extends z.ZodTypeAny>(
  schema: T,
): typeof ErrorResponsesSchema & {
  200: T;
} => ({
  200: schema,
  ...ErrorResponsesSchema,
});

export const DeleteObjectResponseSchema = z.object({ success: z.boolean() });

const DEPLOYMENT_ERROR_STATUS: Record<DeploymentErrorCode, number> = {
  model_not_found: 404,
  name_collision: 409,
  server_resolution_failed: 400,
  unsupported_flavor: 422,
  submission_failed: 502,
  backend_failure: 502,
  readiness_timeout: 504,
  deployment_cancelled: 503,
  structural_decode: 500,
  model_info_not_found: 500,
  deployment_mismatch: 500,
  precondition_violation: 500,
};

/**
 * HTTP status and user-facing message of a deployment failure
 */
export function toApiError(error: DeploymentError): ApiError {
  const statusCode = DEPLOYMENT_ERROR_STATUS[error.code];
  const message =
    statusCode === 502
      ? `Could not reach the platform: ${error.message}`
      : error.message;
  return new ApiError(statusCode, message);
}
