export * from "./logger";
export * from "./db";
export * from "./config";
export * from "./products";
export * from "./coverage";
export * from "./listing";
export * from "./clients/http";
