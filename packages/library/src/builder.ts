import os from "node:os";
import path from "node:path";

import { UniFetchTransport } from "@webfold/uni-fetch";

import { ArchiveEncoder, MHT_CONTENT_TYPE } from "./archive-encoder";
import { DownloadFailedError, InvalidUrlError, MissingTitleError } from "./errors";
import { nodeFileSystem } from "./file-system";
import { validateOutputPath } from "./filename";
import { ResourceGraph } from "./resource-graph";
import { ResourceNode } from "./resource-node";
import type {
  ArchiveIdentity,
  BuilderOptions,
  NodeContext,
  StorageMode
} from "./types";
import { resolveUrl } from "./url-resolver";
import { isDirectoryPath, replaceExtension } from "./utils";

const HTML_EXTENSIONS = [".htm", ".html"] as const;
const TEXT_EXTENSIONS = [".txt"] as const;
const ARCHIVE_EXTENSIONS = [".mht"] as const;

const defaultIdentity = (): ArchiveIdentity => {
  let user: string;
  try {
    user = os.userInfo().username;
  } catch {
    user = process.env.USER ?? process.env.USERNAME ?? "unknown";
  }
  return { user, machine: os.hostname() };
};

/**
 * Saves a web page in one of four shapes: a single HTML file with absolute
 * links, plain text, HTML with every resource downloaded next to it, or an
 * MHT archive. A URL passed to a call is downloaded afresh; a page that
 * failed to download is retried by the next call.
 */
export class ArchiveBuilder {
  readonly mhtContentType = MHT_CONTENT_TYPE;
  warnings: string[] = [];

  private root?: ResourceNode;
  private readonly graph = new ResourceGraph();
  private readonly context: NodeContext;
  private readonly allowRecursion: boolean;
  private readonly identity: ArchiveIdentity;

  constructor(private readonly options: BuilderOptions = {}) {
    this.allowRecursion = options.allowRecursion ?? true;
    this.identity = options.identity ?? defaultIdentity();
    this.context = {
      transport: options.transport ?? new UniFetchTransport(),
      fs: options.fs ?? nodeFileSystem,
      addWebMark: options.addWebMark ?? true,
      stripScripts: options.stripScripts ?? false,
      stripIframes: options.stripIframes ?? false,
      textEncoding: options.textEncoding,
      onLog: options.onLog,
      onWarning: (message) => {
        this.warnings.push(message);
      }
    };
  }

  get url() {
    return this.root?.resolvedUrl ?? "";
  }

  set url(value: string) {
    this.setUrl(value);
  }

  /** The crawled resources of the current page. */
  get resources() {
    return this.graph;
  }

  setUrl(url: string) {
    resolveUrl(url);
    this.root = new ResourceNode(url, this.context);
    this.graph.clear();
    this.log("Target URL set", { url });
  }

  /** Saves the page as one HTML file whose references all point back to the web. */
  async savePage(outputPath: string, url?: string): Promise<string> {
    this.warnings = [];
    validateOutputPath(outputPath, HTML_EXTENSIONS);
    const root = await this.fetchRoot(url);
    this.placeRoot(root, outputPath);
    return root.save();
  }

  async savePageText(outputPath: string, url?: string): Promise<string> {
    this.warnings = [];
    validateOutputPath(outputPath, TEXT_EXTENSIONS);
    const root = await this.fetchRoot(url);
    this.placeRoot(root, outputPath);
    return root.save(replaceExtension(root.downloadPath, ".txt"), { asText: true });
  }

  /**
   * Saves the page with every resource it references downloaded into a
   * `<name>_files` folder beside it, and all references rewritten to those copies.
   */
  async savePageComplete(outputPath: string, url?: string): Promise<string> {
    this.warnings = [];
    validateOutputPath(outputPath, HTML_EXTENSIONS);
    const root = await this.fetchRoot(url);
    this.placeRoot(root, outputPath);

    await this.crawl(root, "disk-permanent");

    for (const node of this.graph.values()) {
      if (node.isFetched && (node.isHtml || node.isCss)) {
        node.convertReferencesToLocal(this.graph);
        await node.save();
      }
    }

    if (root.isHtml || root.isCss) {
      root.convertReferencesToLocal(this.graph);
    }
    const savedPath = await root.save();
    this.resetRoot(root);
    return savedPath;
  }

  async getPageArchive(url?: string): Promise<string> {
    this.warnings = [];
    const root = await this.fetchRoot(url);
    await this.crawl(root, "memory");

    const encoder = this.createEncoder();
    await encoder.writeAll(root, this.graph);
    const archive = encoder.finalize();
    this.graph.clear();
    return archive;
  }

  /**
   * Writes the page as an MHT archive next to `outputPath` and returns the
   * archive's path. Temporary storage is removed once the archive is written.
   */
  async savePageArchive(outputPath: string, storage: StorageMode, url?: string): Promise<string> {
    this.warnings = [];
    validateOutputPath(outputPath, ARCHIVE_EXTENSIONS);
    const root = await this.fetchRoot(url);
    return this.writeArchive(root, outputPath, storage);
  }

  /** Like {@link savePageArchive}, with the page's HTML given instead of downloaded. */
  async convertHtmlToArchive(
    html: string,
    outputPath: string,
    storage: StorageMode,
    url?: string
  ): Promise<string> {
    this.warnings = [];
    validateOutputPath(outputPath, ARCHIVE_EXTENSIONS);
    if (url) {
      this.setUrl(url);
    }
    const root = this.requireRoot();
    root.storage = "memory";
    root.appended = false;
    await root.setHtml(html);
    const archivePath = await this.writeArchive(root, outputPath, storage);
    this.resetRoot(root);
    return archivePath;
  }

  private async writeArchive(root: ResourceNode, outputPath: string, storage: StorageMode) {
    this.placeRoot(root, outputPath);

    if (storage === "disk-permanent") {
      await root.save(replaceExtension(root.downloadPath, ".htm"));
    }

    await this.crawl(root, storage);

    const encoder = this.createEncoder();
    await encoder.writeAll(root, this.graph);
    const archivePath = replaceExtension(root.downloadPath, ".mht");
    await encoder.finalizeToFile(archivePath, root.textEncoding);

    if (storage === "disk-temporary") {
      await this.removeTemporaryFiles();
    }
    this.graph.clear();
    return archivePath;
  }

  private async fetchRoot(url?: string) {
    if (url) {
      this.setUrl(url);
    }
    let root = this.requireRoot();
    if (root.state.kind === "failed") {
      this.resetRoot(root);
      root = this.requireRoot();
    }
    root.storage = "memory";
    root.appended = false;
    await root.fetch();
    if (root.state.kind === "failed") {
      throw new DownloadFailedError(root.resolvedUrl, root.state.error);
    }
    return root;
  }

  // A fresh root: the next fetch downloads the page again.
  private resetRoot(root: ResourceNode) {
    this.root = new ResourceNode(root.originalUrl, this.context);
    this.graph.clear();
  }

  private requireRoot() {
    if (!this.root) {
      throw new InvalidUrlError("");
    }
    return this.root;
  }

  private placeRoot(root: ResourceNode, outputPath: string) {
    root.useHtmlTitleAsFilename = true;
    if (isDirectoryPath(outputPath) && !root.htmlTitle) {
      throw new MissingTitleError(root.resolvedUrl);
    }
    root.downloadPath = outputPath;
  }

  private async crawl(root: ResourceNode, storage: StorageMode) {
    await this.graph.crawl(root, {
      storage,
      targetFolder: root.externalFilesFolder,
      recursive: this.allowRecursion,
      rootUrls: [root.originalUrl, root.resolvedUrl]
    });
    this.log("Crawl finished", { url: root.resolvedUrl, resources: this.graph.size });
  }

  private createEncoder() {
    return new ArchiveEncoder({
      identity: this.identity,
      fs: this.context.fs,
      now: this.options.now,
      onLog: this.options.onLog,
      onWarning: this.context.onWarning
    });
  }

  // Deletes the files of temporary nodes, then every download folder left empty, deepest first.
  private async removeTemporaryFiles() {
    const { fs } = this.context;
    const folders = new Set<string>();
    for (const node of this.graph.values()) {
      if (node.storage !== "disk-temporary") {
        continue;
      }
      folders.add(node.downloadFolder);
      if (!node.isFetched) {
        continue;
      }
      try {
        await fs.remove(node.downloadPath);
      } catch (error) {
        this.warnCleanup(node.downloadPath, error);
      }
    }

    const deepestFirst = Array.from(folders).sort(
      (a, b) => b.split(path.sep).length - a.split(path.sep).length
    );
    for (const folder of deepestFirst) {
      try {
        if (await fs.exists(folder)) {
          const entries = await fs.list(folder);
          if (entries.length === 0) {
            await fs.removeDir(folder);
          }
        }
      } catch (error) {
        this.warnCleanup(folder, error);
      }
    }
  }

  private warnCleanup(target: string, error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    this.log("Failed to remove temporary file", { path: target, reason });
    this.warnings.push(`Failed to remove ${target}: ${reason}`);
  }

  private log(msg: string, meta?: Record<string, unknown>) {
    this.options.onLog?.(msg, meta);
  }
}
