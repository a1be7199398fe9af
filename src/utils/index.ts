/**
 * Utils barrel exports
 */

export * from "./priorityConfigValidation";
