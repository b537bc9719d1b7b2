export * from "./interfaces";
export { createNodeFileSystem, createNodeHttpClient, systemClock } from "./node";
