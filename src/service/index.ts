export * from "./alerts";
export * from "./sync-service";
export * from "./bootstrap";
