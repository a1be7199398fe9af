export * from "./listing/listingProvider";
