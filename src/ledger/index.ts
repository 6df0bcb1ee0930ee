export * from "./manifest";
export * from "./runLedger";
