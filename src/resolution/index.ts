export * from "./resolveProducts";
export * from "./runResolver";
