export * from "./identity.types";
export * from "./resolver";
