export * from "./catalogIndexer";
export * from "./htmlParser";
export * from "./naming";
export * from "./resourceResolver";
