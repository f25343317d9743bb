import {
  InferenceServerTypeSchema,
  SupportedFlavorSchema,
  validateDeploymentName,
} from "@shared";
import { z } from "zod";
import { JobStatusSchema } from "@/job-fabric/types";

export const DeploymentNameSchema = z.string().superRefine((name, ctx) => {
  const problem = validateDeploymentName(name);
  if (problem) {
    ctx.addIssue({ code: "custom", message: problem });
  }
});

export const RegisteredModelSchema = z.object({
  name: z.string(),
  stage: z.string(),
  version: z.string(),
  createdAt: z.string(),
  uri: z.string(),
  link: z.string(),
  publicLink: z.string(),
  source: z.string(),
  flavors: z.array(z.string()),
});

export const InferenceServerSummarySchema = z.object({
  serverName: z.string(),
  jobId: z.string(),
  serverType: InferenceServerTypeSchema,
  status: JobStatusSchema,
  preset: z.string(),
  owner: z.string(),
  createdAt: z.string(),
  endpointUrl: z.string().nullable(),
});
export type InferenceServerSummary = z.infer<
  typeof InferenceServerSummarySchema
>;

export const DeployedModelSummarySchema = z.object({
  /** `<name>:<stage>:<version>` */
  model: z.string(),
  serverType: InferenceServerTypeSchema,
  serverName: z.string(),
  serverJobId: z.string(),
  createdAt: z.string(),
  endpointUrl: z.string().nullable(),
});
export type DeployedModelSummary = z.infer<typeof DeployedModelSummarySchema>;

export const ServerTypeQuerySchema = z.object({
  type: InferenceServerTypeSchema.optional(),
});

export const ListImagesQuerySchema = z.object({
  triton: z.stringbool().default(true),
  github: z.stringbool().default(true),
  platform: z.stringbool().default(true),
});

export const ImageTagsQuerySchema = z.object({
  image: z.string().min(1),
});

export const ModelReferenceSchema = z.object({
  name: z.string().min(1),
  stage: z.string().min(1),
  version: z.string().min(1),
});

export const DeploySingleModelBodySchema = z.object({
  model: ModelReferenceSchema,
  /** Defaults to `<model>-<stage>` */
  deploymentName: DeploymentNameSchema.optional(),
  preset: z.string().min(1),
  image: z.string().min(1),
  enableAuth: z.boolean().default(true),
});

export const DeploySingleModelResponseSchema = InferenceServerSummarySchema;

export const MultiModelTargetSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("existing"),
    serverJobId: z.string().min(1),
  }),
  z.object({
    type: z.literal("new"),
    serverName: DeploymentNameSchema,
    preset: z.string().min(1),
    image: z.string().min(1),
    enableAuth: z.boolean().default(true),
  }),
]);

export const DeployMultiModelBodySchema = z.object({
  model: ModelReferenceSchema,
  deploymentName: DeploymentNameSchema.optional(),
  /** Checked against what the server supports when the model is registered */
  flavor: z.string().min(1).default(SupportedFlavorSchema.enum.onnx),
  target: MultiModelTargetSchema,
});

export const DeployMultiModelResponseSchema = z.object({
  server: InferenceServerSummarySchema,
  deployment: z.object({
    name: z.string(),
    flavor: SupportedFlavorSchema,
  }),
});
