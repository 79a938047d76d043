export * from "./errors";
export * from "./users";
export * from "./permissions";
export * from "./groups";
export * from "./display";
