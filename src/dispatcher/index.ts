export * from "./dispatcher";
