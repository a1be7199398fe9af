export * from "./appConfig";
export * from "./priorityConfig";
