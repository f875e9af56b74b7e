export * from "./invariant-checks";
