export * from "./api";
export * from "./inference";
