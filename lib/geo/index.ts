export * from "./point";
export * from "./feature-collection";
