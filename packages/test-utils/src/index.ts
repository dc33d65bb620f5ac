export * from "./fixtures";
export * from "./logging";
export * from "./transport";
