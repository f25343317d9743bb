import { z } from "zod";

export const TimeInMs = {
  Second: 1_000,
  Minute: 1_000 * 60,
  Hour: 1_000 * 60 * 60,
  Day: 1_000 * 60 * 60 * 24,
} as const;

/**
 * Wire values of the `server-type::<type>` job tag.
 *
 * `bentoml` is reserved: it can be decoded but is never offered for
 * deployment and is excluded from discovery.
 */
export const InferenceServerTypeSchema = z.enum([
  "none",
  "MLFlow",
  "Triton",
  "bentoml",
]);
export type InferenceServerType = z.infer<typeof InferenceServerTypeSchema>;

export const InferenceServerType = {
  None: "none",
  SingleModel: "MLFlow",
  MultiModel: "Triton",
  BentoMl: "bentoml",
} as const satisfies Record<string, InferenceServerType>;

export const DISABLED_SERVER_TYPES: readonly InferenceServerType[] = [
  InferenceServerType.BentoMl,
];

export const ENABLED_SERVER_TYPES: readonly InferenceServerType[] =
  InferenceServerTypeSchema.options.filter(
    (type) => !DISABLED_SERVER_TYPES.includes(type),
  );

/** Serving flavors the multi-model server can load */
export const SupportedFlavorSchema = z.enum(["onnx", "triton"]);
export type SupportedFlavor = z.infer<typeof SupportedFlavorSchema>;
export const DEFAULT_FLAVOR: SupportedFlavor = "onnx";

export const TagProtocol = {
  Separator: "::",
  ServerTypeKey: "server-type",
  ModelInfoKey: "model-info",
  ModelInfoFieldSeparator: ":",
  DefaultNamespace: "in-job-deployments",
  DefaultControllerId: "inference-server",
} as const;

/** Stages returned by the model registry listing */
export const LISTED_MODEL_STAGES = ["Staging", "Production"] as const;

export const NO_NAME_PLACEHOLDER = "<no-name>";

export const DeploymentNameRules = {
  MinLength: 3,
  MaxLength: 40,
} as const;
