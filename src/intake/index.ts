export * from "./intake.types";
export * from "./notification";
export * from "./signature";
