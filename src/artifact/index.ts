export * from "./artifact.types";
export * from "./integrity";
export * from "./layout";
export * from "./mlmodel";
export * from "./naming";
export * from "./repackager";
export { getFlavorTemplate } from "./templates";
