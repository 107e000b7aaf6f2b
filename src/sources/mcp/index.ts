export * from "./types";
export * from "./local";
export * from "./remote";
export * from "./driver";
