export * from "./logger";
export * from "./emoji";
export * from "./snippet";
export * from "./compiler";
export * from "./config";
