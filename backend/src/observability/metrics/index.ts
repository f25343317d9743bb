export * as deployments from "./deployments";
