export * from "./types";
export * from "./errors";
export * from "./session";
export * from "./manual";
export * from "./openapi";
export * from "./http";
export * from "./graphql";
export * from "./cli";
export * from "./socket";
export * from "./text";
export * from "./mcp";
export * from "./fake";
export * from "./registry";
