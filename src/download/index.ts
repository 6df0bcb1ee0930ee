export * from "./conflictPolicy";
export * from "./transferManager";
export * from "./downloader";
