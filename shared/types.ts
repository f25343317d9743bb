import { z } from "zod";

export const ApiErrorTypeSchema = z.enum([
  "api_internal_server_error",
  "api_validation_error",
  "api_not_found_error",
  "api_conflict_error",
  "api_unprocessable_entity_error",
  "api_bad_gateway_error",
  "api_service_unavailable_error",
  "api_gateway_timeout_error",
  "unknown_api_error",
]);

export type ApiErrorType = z.infer<typeof ApiErrorTypeSchema>;

/**
 * https://stackoverflow.com/a/70765851
 */
export class ApiError extends Error {
  type: ApiErrorType;
  statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.statusCode = statusCode;

    switch (statusCode) {
      case 500:
        this.type = "api_internal_server_error";
        break;
      case 400:
        this.type = "api_validation_error";
        break;
      case 404:
        this.type = "api_not_found_error";
        break;
      case 409:
        this.type = "api_conflict_error";
        break;
      case 422:
        this.type = "api_unprocessable_entity_error";
        break;
      case 502:
        this.type = "api_bad_gateway_error";
        break;
      case 503:
        this.type = "api_service_unavailable_error";
        break;
      case 504:
        this.type = "api_gateway_timeout_error";
        break;
      default:
        this.type = "unknown_api_error";
        break;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}
