export * from "./filenameParser";
export * from "./productCatalog";
