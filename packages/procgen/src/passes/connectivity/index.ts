export * from "./room-connector";
