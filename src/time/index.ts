export * from "./productTimestamp";
export * from "./timeWindow";
export * from "./gpsWeek";
