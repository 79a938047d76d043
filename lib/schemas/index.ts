/**
 * Central schema export point for the domain model.
 */

export * from "./accounts";
