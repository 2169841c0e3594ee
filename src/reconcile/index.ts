export * from "./reconcile.types";
export * from "./plan";
export * from "./retry";
export * from "./lease";
export * from "./engine";
