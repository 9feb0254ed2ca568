export { QdrantClient, pointId } from "./client.js";
export type { QdrantConfig } from "./client.js";
