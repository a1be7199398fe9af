export * from "./logger";
export * from "./products";
export * from "./priorities";
export * from "./time";
export * from "./listing";
export * from "./clients/http";
