export { ArtifactCollector, findArtifact } from "./artifact-collector.js";
export type { CollectionResult } from "./artifact-collector.js";
