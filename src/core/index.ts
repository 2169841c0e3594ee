export * from "./interfaces";
export * from "./tar-utils";
export * from "./node";
