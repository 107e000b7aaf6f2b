export * from "./types";
export * from "./names";
export * from "./schema";
export * from "./catalog";
