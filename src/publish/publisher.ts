/**
 * Publisher
 * 完全な ArtifactSet を 0 個以上のエンドポイントへ公開する
 *
 * - エンドポイントごとに独立して試行する
 * - (canonical_name, version) ごとに冪等: 既存エントリは skip か replace のどちらか
 * - 必須エンドポイントの失敗は Run の失敗、任意エンドポイントの失敗は警告（設定で変更可）
 */

import type {
  Artifact,
  ArtifactSet,
  Credentials,
  EndpointConfig,
  EndpointReport,
  PackageIndex,
  PublishEntryResult,
  PublishReport,
} from "../types/index.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { describeError } from "../build/build-task.js";

/**
 * 公開先（設定 + インデックス実装）
 */
export interface PublishTarget {
  endpoint: EndpointConfig;
  index: PackageIndex;
}

/**
 * 環境変数から認証情報を解決する関数
 */
export type CredentialsResolver = (variable: string) => string | undefined;

export interface PublisherOptions {
  targets: PublishTarget[];
  /** true なら任意エンドポイントの失敗でも VersionAdvancer をブロックする */
  blockOnOptionalFailure?: boolean;
  resolveCredentials?: CredentialsResolver;
  logger?: Logger;
}

/**
 * 公開対象がない（致命的）
 */
export class NoArtifactsError extends Error {
  constructor() {
    super("No artifacts found to publish");
    this.name = "NoArtifactsError";
  }
}

/**
 * エンドポイント単位の失敗
 */
class EndpointFailure extends Error {
  constructor(
    message: string,
    public readonly entries: PublishEntryResult[]
  ) {
    super(message);
    this.name = "EndpointFailure";
  }
}

export class Publisher {
  private readonly targets: PublishTarget[];
  private readonly blockOnOptionalFailure: boolean;
  private readonly resolveCredentials: CredentialsResolver;
  private readonly logger: Logger;

  constructor(options: PublisherOptions) {
    this.targets = options.targets;
    this.blockOnOptionalFailure = options.blockOnOptionalFailure ?? false;
    this.resolveCredentials = options.resolveCredentials ?? ((name) => process.env[name]);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * ArtifactSet を全エンドポイントへ公開する
   * @throws NoArtifactsError - 成果物が 0 件
   */
  async publish(set: ArtifactSet, version: string): Promise<PublishReport> {
    if (set.artifacts.length === 0) {
      throw new NoArtifactsError();
    }

    const endpoints = await Promise.all(
      this.targets.map((target) => this.publishToEndpoint(target, set.artifacts, version))
    );

    const warnings: string[] = [];
    let success = true;
    for (const report of endpoints) {
      if (report.success) continue;
      if (report.required || this.blockOnOptionalFailure) {
        success = false;
      } else {
        warnings.push(`Optional endpoint '${report.endpoint}' failed: ${report.error ?? "unknown error"}`);
      }
    }

    for (const warning of warnings) {
      this.logger.warn("publish_warning", warning);
    }

    return { success, endpoints, warnings };
  }

  private async publishToEndpoint(
    target: PublishTarget,
    artifacts: readonly Artifact[],
    version: string
  ): Promise<EndpointReport> {
    const { endpoint } = target;
    const base = { endpoint: endpoint.name, required: endpoint.required };

    try {
      const credentials = this.credentialsFor(endpoint);
      const entries: PublishEntryResult[] = [];
      for (const artifact of artifacts) {
        try {
          entries.push(await this.publishOne(target, artifact, version, credentials));
        } catch (error) {
          throw new EndpointFailure(
            `${artifact.canonical_name}: ${describeError(error)}`,
            entries
          );
        }
      }

      this.logger.info("endpoint_published", "Endpoint publish finished", {
        endpoint: endpoint.name,
        published: entries.filter((e) => e.outcome === "published").length,
        skipped: entries.filter((e) => e.outcome === "skipped").length,
        replaced: entries.filter((e) => e.outcome === "replaced").length,
      });
      return { ...base, success: true, entries };
    } catch (error) {
      const message = describeError(error);
      const entries = error instanceof EndpointFailure ? error.entries : [];
      this.logger.error("endpoint_failed", "Endpoint publish failed", {
        endpoint: endpoint.name,
        required: endpoint.required,
        error: message,
      });
      return { ...base, success: false, entries, error: message };
    }
  }

  /**
   * 1 つの成果物を公開する
   * 既存エントリがあれば on_existing に従い skip / replace する
   */
  private async publishOne(
    target: PublishTarget,
    artifact: Artifact,
    version: string,
    credentials: Credentials | undefined
  ): Promise<PublishEntryResult> {
    const { endpoint, index } = target;
    const existing = await index.lookup(artifact.canonical_name, version);

    if (existing) {
      if (endpoint.on_existing === "skip") {
        if (existing.digest !== artifact.digest) {
          throw new Error(
            `Conflicting entry already published under ${version} (digest ${existing.digest})`
          );
        }
        return { canonical_name: artifact.canonical_name, outcome: "skipped", location: existing.location };
      }

      await index.remove(artifact.canonical_name, version, credentials);
      const replaced = await index.publish(artifact, version, credentials);
      return { canonical_name: artifact.canonical_name, outcome: "replaced", location: replaced.location };
    }

    const published = await index.publish(artifact, version, credentials);
    return { canonical_name: artifact.canonical_name, outcome: "published", location: published.location };
  }

  private credentialsFor(endpoint: EndpointConfig): Credentials | undefined {
    if (endpoint.credentials_env === undefined) {
      return undefined;
    }
    const token = this.resolveCredentials(endpoint.credentials_env);
    if (token === undefined || token.length === 0) {
      throw new Error(`Credentials variable ${endpoint.credentials_env} is not set`);
    }
    return { token };
  }
}
