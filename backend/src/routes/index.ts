export { default as deploymentRoutes } from "./deployment";
export { default as discoveryRoutes } from "./discovery";
export { default as inferenceServerRoutes } from "./inference-server";
export { default as modelRegistryRoutes } from "./model-registry";
