export * from "./coverageResolver";
export * from "./prioritySelector";
export * from "./coverageQueries";
