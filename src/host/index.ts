export * from "./host-tool";
