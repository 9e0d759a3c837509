import path from "node:path";

import { InvalidExtensionError, InvalidFileNameError } from "./errors";
import { hashString, isDirectoryPath } from "./utils";

const INVALID_FILENAME_PATTERN = /[\\/:*?"<>|]|^\s+|\s+$/g;
const URL_FILENAME_PATTERN = /\/([^/?]+)[^/]*$/;

export type FilenameHints = {
  extension: string;
  title?: string;
};

export const sanitizeFilename = (value: string) =>
  value.replace(INVALID_FILENAME_PATTERN, "").replace(/\s{2,}/g, " ").trim();

export const stripExtension = (filename: string) =>
  filename.slice(0, filename.length - path.extname(filename).length);

const queryOf = (url: string) => {
  const start = url.indexOf("?");
  if (start < 0) {
    return "";
  }
  const end = url.indexOf("#", start);
  return end < 0 ? url.slice(start) : url.slice(start, end);
};

/**
 * Derives a local file name for a URL: the last path segment, made unique by a
 * hash of the query string when there is one. Falls back to the page title and
 * finally to a hash of the whole URL.
 */
export const filenameFromUrl = (url: string, hints: FilenameHints) => {
  let filename = URL_FILENAME_PATTERN.exec(url)?.[1] ?? "";
  const query = queryOf(url);
  if (filename && query) {
    filename = `${stripExtension(filename)}_${hashString(query)}${hints.extension}`;
  }
  if (!filename && hints.title) {
    filename = `${hints.title}.htm`;
  }
  if (!filename) {
    filename = `${hashString(url)}${hints.extension}`;
  }
  return sanitizeFilename(filename);
};

/**
 * Checks an output path before anything is downloaded. A path ending in a
 * separator names a folder and is accepted as is.
 */
export const validateOutputPath = (outputPath: string, allowedExtensions: readonly string[]) => {
  if (isDirectoryPath(outputPath)) {
    return;
  }
  const extension = path.extname(outputPath);
  if (!extension) {
    throw new InvalidFileNameError(outputPath, allowedExtensions);
  }
  const lowered = extension.toLowerCase();
  if (!allowedExtensions.some((allowed) => allowed.toLowerCase() === lowered)) {
    throw new InvalidExtensionError(outputPath, extension, allowedExtensions);
  }
};
