export * from "./corridor-carver";
