/**
 * Publish モジュール
 */

export { Publisher, NoArtifactsError } from "./publisher.js";
export type { PublisherOptions, PublishTarget, CredentialsResolver } from "./publisher.js";
export { DirectoryIndex, DirectoryIndexError } from "./directory-index.js";
export type { DirectoryIndexOptions } from "./directory-index.js";
