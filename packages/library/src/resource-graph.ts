import path from "node:path";

import { InvalidUrlError } from "./errors";
import { ResourceNode } from "./resource-node";
import type { StorageMode } from "./types";

export type CrawlOptions = {
  storage: StorageMode;
  /** Folder that disk-stored nodes found on this page are saved into. */
  targetFolder: string;
  recursive: boolean;
  /** URLs of the page being archived; references back to it are not fetched again. */
  rootUrls: readonly string[];
};

/**
 * Every resource reachable from a root page, keyed by the URL exactly as it was
 * referenced. Iteration is in ascending key order so archives come out the same
 * on every run.
 */
export class ResourceGraph {
  private readonly nodes = new Map<string, ResourceNode>();
  private readonly claimedPaths = new Set<string>();

  get size() {
    return this.nodes.size;
  }

  has(url: string) {
    return this.nodes.has(url);
  }

  get(url: string) {
    return this.nodes.get(url);
  }

  // First writer wins.
  insert(url: string, node: ResourceNode) {
    if (this.nodes.has(url)) {
      return false;
    }
    this.nodes.set(url, node);
    return true;
  }

  keys(): string[] {
    return Array.from(this.nodes.keys()).sort();
  }

  values(): ResourceNode[] {
    return this.keys().flatMap((key) => {
      const node = this.nodes.get(key);
      return node ? [node] : [];
    });
  }

  clear() {
    this.nodes.clear();
    this.claimedPaths.clear();
  }

  // Case-insensitive, as on Windows and macOS file systems.
  claimPath = (filePath: string) => {
    const key = path.resolve(filePath).toLowerCase();
    if (this.claimedPaths.has(key)) {
      return false;
    }
    this.claimedPaths.add(key);
    return true;
  };

  /**
   * Fetches everything `node` references that is not known yet. HTML and CSS
   * children are crawled in turn, each into its own `_files` folder. A URL is
   * recorded before its children are visited, which is what stops cycles.
   */
  async crawl(node: ResourceNode, options: CrawlOptions): Promise<void> {
    const { context } = node;
    const urls = new Set(node.references().values());
    if (urls.size === 0) {
      return;
    }
    context.onLog?.("Crawling references", { url: node.resolvedUrl, count: urls.size });

    for (const url of urls) {
      if (this.nodes.has(url) || options.rootUrls.includes(url)) {
        continue;
      }

      let child: ResourceNode;
      try {
        child = new ResourceNode(url, context, {
          storage: options.storage,
          claimPath: this.claimPath
        });
      } catch (error) {
        if (!(error instanceof InvalidUrlError)) {
          throw error;
        }
        context.onWarning?.(error.message);
        continue;
      }

      if (options.storage !== "memory") {
        await context.fs.ensureDir(options.targetFolder);
        child.downloadFolder = options.targetFolder;
      }

      await child.fetch();
      this.insert(url, child);

      if (options.recursive && (child.isHtml || child.isCss)) {
        await this.crawl(child, { ...options, targetFolder: child.externalFilesFolder });
      }
    }
  }
}
