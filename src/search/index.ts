export * from "./regex";
