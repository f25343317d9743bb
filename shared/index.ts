export * from "./consts";
export * from "./routes";
export * from "./types";
export * from "./utils";
