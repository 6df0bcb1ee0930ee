export * from "./grammar";
