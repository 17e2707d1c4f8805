/**
 * Directory Index
 * ローカルディレクトリをパッケージインデックスとして扱う（ステージング用）
 *
 * ```
 * <root>/<version>/<canonical_name>/<file_name>
 * <root>/<version>/<canonical_name>/entry.json
 * ```
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { Artifact, PackageIndex, PublishedEntry } from "../types/index.js";
import { withFileLock } from "../lock/file-lock.js";

/**
 * Directory Index エラー
 */
export class DirectoryIndexError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "DirectoryIndexError";
  }
}

const ENTRY_FILE = "entry.json";

/**
 * entry.json の Zod スキーマ
 */
const EntrySchema = z.object({
  canonical_name: z.string(),
  version: z.string(),
  digest: z.string(),
  file_name: z.string(),
  published_at: z.string(),
});

type EntryFile = z.infer<typeof EntrySchema>;

export interface DirectoryIndexOptions {
  rootDir: string;
}

/**
 * 認証情報は受け取っても使わない（設定では credentials_env を拒否する）
 */
export class DirectoryIndex implements PackageIndex {
  private readonly rootDir: string;

  constructor(options: DirectoryIndexOptions) {
    this.rootDir = options.rootDir;
  }

  private getEntryDir(canonicalName: string, version: string): string {
    return path.join(this.rootDir, version, canonicalName);
  }

  async lookup(canonicalName: string, version: string): Promise<PublishedEntry | null> {
    const entry = await this.readEntry(canonicalName, version);
    if (!entry) return null;
    return this.toPublished(entry);
  }

  /**
   * 成果物を書き込む
   * 同名・同バージョンのエントリが既にあれば拒否する
   */
  async publish(artifact: Artifact, version: string): Promise<PublishedEntry> {
    const dir = this.getEntryDir(artifact.canonical_name, version);
    const fileName = path.basename(artifact.file_name);

    return withFileLock(dir, async () => {
      if (await this.readEntry(artifact.canonical_name, version)) {
        throw new DirectoryIndexError(
          `Entry already exists: ${artifact.canonical_name}@${version}`
        );
      }

      const entry: EntryFile = {
        canonical_name: artifact.canonical_name,
        version,
        digest: artifact.digest,
        file_name: fileName,
        published_at: new Date().toISOString(),
      };

      try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(path.join(dir, fileName), artifact.binary);
        // entry.json は最後に書く（存在すれば公開済み）
        await fs.writeFile(path.join(dir, ENTRY_FILE), JSON.stringify(entry, null, 2), "utf-8");
      } catch (error) {
        throw new DirectoryIndexError(
          `Failed to publish ${artifact.canonical_name}@${version}`,
          error
        );
      }

      return this.toPublished(entry);
    });
  }

  async remove(canonicalName: string, version: string): Promise<void> {
    const dir = this.getEntryDir(canonicalName, version);
    await withFileLock(dir, async () => {
      try {
        await fs.rm(dir, { recursive: true, force: true });
      } catch (error) {
        throw new DirectoryIndexError(`Failed to remove ${canonicalName}@${version}`, error);
      }
    });
  }

  /**
   * バージョン配下の公開済みエントリを一覧取得
   */
  async list(version: string): Promise<PublishedEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(path.join(this.rootDir, version));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw new DirectoryIndexError(`Failed to list version ${version}`, error);
    }

    const entries: PublishedEntry[] = [];
    for (const name of names.sort()) {
      const entry = await this.readEntry(name, version);
      if (entry) {
        entries.push(this.toPublished(entry));
      }
    }
    return entries;
  }

  private async readEntry(canonicalName: string, version: string): Promise<EntryFile | null> {
    const filePath = path.join(this.getEntryDir(canonicalName, version), ENTRY_FILE);

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw new DirectoryIndexError(`Failed to read entry: ${filePath}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new DirectoryIndexError(`Invalid entry JSON: ${filePath}`, error);
    }

    const result = EntrySchema.safeParse(parsed);
    if (!result.success) {
      throw new DirectoryIndexError(`Invalid entry format: ${filePath}: ${result.error.message}`);
    }
    return result.data;
  }

  private toPublished(entry: EntryFile): PublishedEntry {
    return {
      canonical_name: entry.canonical_name,
      version: entry.version,
      digest: entry.digest,
      location: path.join(this.getEntryDir(entry.canonical_name, entry.version), entry.file_name),
    };
  }
}
