export * from "./image-resolver";
