export * from "./room-placer";
