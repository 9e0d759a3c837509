import path from "node:path";

import * as cheerio from "cheerio";

import {
  extensionFromContentType,
  isCssContentType,
  isHtmlContentType
} from "./content-type";
import { NotHtmlOperationError } from "./errors";
import { filenameFromUrl, sanitizeFilename, stripExtension } from "./filename";
import type { ResourceGraph } from "./resource-graph";
import { extractReferences } from "./resources";
import {
  addWebMark,
  readBaseHref,
  removeBaseTags,
  stripHtmlTag,
  toAbsolute,
  toLocal
} from "./rewrite-links";
import { extractPlainText, type PlainTextOptions } from "./text-extract";
import type { FetchedResource, NodeContext, NodeState, StorageMode } from "./types";
import { decomposeUrl, resolveContentLocation, resolveUrl } from "./url-resolver";
import {
  DEFAULT_TEXT_ENCODING,
  decodeText,
  encodeText,
  hashString,
  isDirectoryPath,
  toPosixPath
} from "./utils";

const MAX_TITLE_LENGTH = 50;

export type ResourceNodeOptions = {
  storage?: StorageMode;
  validate?: boolean;
  /** Reserves a download path; returns false when another node already holds it. */
  claimPath?: (filePath: string) => boolean;
};

export type SaveOptions = {
  asText?: boolean;
};

/**
 * One URL of a page: its downloaded content, how that content is classified,
 * and where it goes on disk. A node is fetched at most once; a failed fetch is
 * remembered and never retried.
 */
export class ResourceNode {
  readonly originalUrl: string;
  resolvedUrl: string;
  urlRoot: string;
  urlFolder: string;
  storage: StorageMode;
  contentType = "";
  contentLocation?: string;
  isBinary = false;
  textEncoding?: string;
  state: NodeState = { kind: "not-fetched" };
  appended = false;
  useHtmlTitleAsFilename = false;

  private content: Uint8Array = new Uint8Array(0);
  private referenceCache?: Map<string, string>;
  private folder?: string;
  private filename?: string;
  private extension?: string;
  private readonly claimPath?: (filePath: string) => boolean;

  constructor(
    url: string,
    readonly context: NodeContext,
    options: ResourceNodeOptions = {}
  ) {
    this.originalUrl = url;
    this.storage = options.storage ?? "memory";
    this.claimPath = options.claimPath;
    this.resolvedUrl = resolveUrl(url, { validate: options.validate });
    const parts = decomposeUrl(this.resolvedUrl);
    this.urlRoot = parts.root;
    this.urlFolder = parts.folder;
  }

  get isFetched() {
    return this.state.kind === "fetched";
  }

  get isHtml() {
    return isHtmlContentType(this.contentType);
  }

  get isCss() {
    return isCssContentType(this.contentType);
  }

  get bytes() {
    return this.content;
  }

  get text() {
    if (!this.isFetched) {
      return "";
    }
    if (this.isBinary) {
      return `[${this.content.length} bytes of binary data]`;
    }
    return decodeText(this.content, this.textEncoding);
  }

  get htmlTitle() {
    if (!this.isHtml) {
      throw new NotHtmlOperationError(this.resolvedUrl, this.contentType, "Reading the page title");
    }
    const $ = cheerio.load(this.text);
    const title = $("title").first().text().replace(/\s+/g, " ").trim();
    return title.slice(0, MAX_TITLE_LENGTH);
  }

  get downloadFolder() {
    return this.folder ?? process.cwd();
  }

  set downloadFolder(value: string) {
    this.folder = value;
  }

  get downloadExtension() {
    if (this.extension) {
      return this.extension;
    }
    return this.isFetched ? extensionFromContentType(this.contentType) : "";
  }

  set downloadExtension(value: string) {
    this.extension = value;
  }

  get downloadFilename() {
    if (this.filename) {
      return this.filename;
    }
    const title = this.isFetched && this.isHtml ? sanitizeFilename(this.htmlTitle) : "";
    if (this.useHtmlTitleAsFilename && title) {
      return `${title}.htm`;
    }
    return filenameFromUrl(this.resolvedUrl, { extension: this.downloadExtension, title });
  }

  set downloadFilename(value: string) {
    this.filename = value;
  }

  get downloadPath() {
    const filename = this.downloadFilename;
    const name = path.extname(filename) ? filename : `${filename}${this.downloadExtension}`;
    return path.join(this.downloadFolder, name);
  }

  // A value ending in a separator only moves the folder; the file name is derived again.
  set downloadPath(value: string) {
    if (isDirectoryPath(value)) {
      this.folder = value;
      this.filename = undefined;
      return;
    }
    this.folder = path.dirname(value);
    this.filename = path.basename(value);
  }

  get externalFilesFolder() {
    return path.join(this.downloadFolder, `${stripExtension(this.downloadFilename)}_files`);
  }

  async fetch(): Promise<void> {
    if (this.state.kind !== "not-fetched") {
      return;
    }
    this.log("Fetching resource", { url: this.resolvedUrl });

    let resource: FetchedResource;
    try {
      resource = await this.context.transport.fetch(this.resolvedUrl);
    } catch (error) {
      this.state = { kind: "failed", error };
      const reason = error instanceof Error ? error.message : String(error);
      this.log("Failed to fetch resource", { url: this.resolvedUrl, reason });
      this.context.onWarning?.(`Failed to fetch ${this.resolvedUrl}: ${reason}`);
      return;
    }

    if (resource.contentLocation) {
      this.contentLocation = resource.contentLocation;
      this.relocate(resolveContentLocation(resource.contentLocation, this.resolvedUrl));
    }
    await this.accept(
      resource.bytes,
      resource.contentType,
      resource.isBinary,
      resource.detectedEncoding
    );
  }

  /** Uses an HTML string as this node's content, as if it had been downloaded. */
  async setHtml(html: string): Promise<void> {
    const encoding = this.context.textEncoding ?? DEFAULT_TEXT_ENCODING;
    this.state = { kind: "not-fetched" };
    this.appended = false;
    await this.accept(encodeText(html, encoding), "text/html", false, encoding);
  }

  references(): ReadonlyMap<string, string> {
    if (!this.isFetched || this.isBinary) {
      return new Map();
    }
    if (!this.referenceCache) {
      this.referenceCache = extractReferences(this.text, this.context.onLog);
    }
    return this.referenceCache;
  }

  convertReferencesToLocal(graph: ResourceGraph): void {
    if (!this.isHtml && !this.isCss) {
      throw new NotHtmlOperationError(
        this.resolvedUrl,
        this.contentType,
        "Converting references to local paths"
      );
    }
    const references = this.references();
    if (references.size === 0) {
      return;
    }
    const converted = toLocal(this.text, references, (url) => {
      const target = graph.get(url);
      if (!target || !target.isFetched) {
        return undefined;
      }
      return toPosixPath(path.relative(this.downloadFolder, target.downloadPath));
    });
    this.setText(converted);
  }

  toPlainText(options: PlainTextOptions = {}) {
    return extractPlainText(this.text, options);
  }

  async save(filePath: string = this.downloadPath, options: SaveOptions = {}): Promise<string> {
    if (!this.isFetched) {
      throw new Error(`${this.resolvedUrl} has not been downloaded, so it cannot be saved.`);
    }
    const data =
      options.asText && !this.isBinary
        ? encodeText(this.toPlainText(), this.textEncoding)
        : this.content;
    this.log("Saving resource", { url: this.resolvedUrl, path: filePath });
    await this.context.fs.write(filePath, data);
    return filePath;
  }

  private relocate(url: string) {
    this.resolvedUrl = url;
    const parts = decomposeUrl(url);
    this.urlRoot = parts.root;
    this.urlFolder = parts.folder;
  }

  private async accept(
    bytes: Uint8Array,
    contentType: string,
    isBinary: boolean,
    detectedEncoding?: string
  ) {
    this.contentType = contentType;
    this.isBinary = isBinary;
    this.textEncoding = isBinary
      ? undefined
      : this.context.textEncoding ?? detectedEncoding ?? DEFAULT_TEXT_ENCODING;
    this.setBytes(bytes);
    this.state = { kind: "fetched" };
    this.log("Fetched resource", {
      url: this.resolvedUrl,
      contentType,
      size: bytes.length
    });

    if (this.isHtml) {
      this.setText(this.processHtml(this.text));
    } else if (this.isCss) {
      this.setText(toAbsolute(this.text, this.urlRoot, this.urlFolder));
    }

    if (this.storage !== "memory") {
      this.reserveDownloadPath();
      await this.save();
    }
  }

  // A name already taken in the folder gets the URL's hash appended.
  private reserveDownloadPath() {
    if (!this.claimPath || this.claimPath(this.downloadPath)) {
      return;
    }
    const name = path.basename(this.downloadPath);
    this.filename = `${stripExtension(name)}_${hashString(this.resolvedUrl)}${path.extname(name)}`;
    this.claimPath(this.downloadPath);
    this.log("Renamed download to avoid a name clash", {
      url: this.resolvedUrl,
      path: this.downloadPath
    });
  }

  private processHtml(html: string) {
    let processed = html;
    if (this.context.addWebMark) {
      processed = addWebMark(processed, this.resolvedUrl);
    }
    if (this.context.stripScripts) {
      processed = stripHtmlTag("script", processed);
    }
    if (this.context.stripIframes) {
      processed = stripHtmlTag("iframe", processed);
    }
    const baseHref = readBaseHref(processed);
    if (baseHref) {
      this.urlFolder = baseHref.endsWith("/") ? baseHref.slice(0, -1) : baseHref;
    }
    processed = removeBaseTags(processed);
    return toAbsolute(processed, this.urlRoot, this.urlFolder);
  }

  private setText(text: string) {
    this.setBytes(encodeText(text, this.textEncoding));
  }

  private setBytes(bytes: Uint8Array) {
    this.content = bytes;
    this.referenceCache = undefined;
  }

  private log(msg: string, meta?: Record<string, unknown>) {
    this.context.onLog?.(msg, meta);
  }
}
