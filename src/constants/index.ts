export * from "./logger";
export * from "./keywords";
export * from "./pack";
export * from "./config";
export * from "./codepoints";
export * from "./textNormalization";
