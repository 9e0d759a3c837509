export { ArchiveBuilder } from "./builder";
export { nodeFileSystem } from "./file-system";
export {
  ArchiveEncoder,
  MHT_CONTENT_TYPE,
  MIME_BOUNDARY,
  base64Lines
} from "./archive-encoder";
export type { ArchiveEncoderOptions } from "./archive-encoder";
export { ResourceGraph } from "./resource-graph";
export type { CrawlOptions } from "./resource-graph";
export { ResourceNode } from "./resource-node";
export type { ResourceNodeOptions, SaveOptions } from "./resource-node";
export {
  DownloadFailedError,
  InvalidExtensionError,
  InvalidFileNameError,
  InvalidUrlError,
  MissingTitleError,
  NotHtmlOperationError,
  isBuilderError
} from "./errors";
export type { BuilderError } from "./errors";
export {
  extensionFromContentType,
  isBinaryContentType,
  isCssContentType,
  isHtmlContentType,
  isTextResponse
} from "./content-type";
export { decomposeUrl, resolveUrl } from "./url-resolver";
export { extractReferences } from "./resources";
export { toAbsolute, toLocal, stripHtmlTag } from "./rewrite-links";
export { absolutizeCssReferences } from "./css-rewrite";
export { filenameFromUrl, sanitizeFilename, validateOutputPath } from "./filename";
export { decodeQuotedPrintable, encodeQuotedPrintable } from "./quoted-printable";
export { extractPlainText } from "./text-extract";
export { VERSION } from "./version";
export type {
  ArchiveIdentity,
  BuilderOptions,
  FileSystem,
  LogHandler,
  NodeState,
  StorageMode,
  Transport
} from "./types";
