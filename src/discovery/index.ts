export * from "./aggregator";
