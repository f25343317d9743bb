export const RouteId = {
  // Model Registry Routes
  GetRegisteredModels: "getRegisteredModels",

  // Inference Server Routes
  GetInferenceServers: "getInferenceServers",
  DeleteInferenceServer: "deleteInferenceServer",
  GetDeployedModels: "getDeployedModels",

  // Discovery Routes
  GetPresets: "getPresets",
  GetImages: "getImages",
  GetImageTags: "getImageTags",

  // Deployment Routes
  DeploySingleModel: "deploySingleModel",
  DeployMultiModel: "deployMultiModel",
} as const;

export type RouteId = (typeof RouteId)[keyof typeof RouteId];
