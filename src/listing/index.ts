export * from "./archiveAnchors";
export * from "./archiveListingProvider";
export * from "./fileListingProvider";
export * from "./cachedListingProvider";
export * from "./fetchWeekListings";
export * from "./createListingProvider";
