import { isBinaryContentType } from "@webfold/uni-fetch";

export { isBinaryContentType };

const DEFAULT_EXTENSION = ".htm";

const EXTENSION_BY_MEDIA_TYPE = new Map<string, string>([
  ["text/html", ".htm"],
  ["text/css", ".css"],
  ["text/plain", ".txt"],
  ["text/javascript", ".js"],
  ["application/javascript", ".js"],
  ["application/x-javascript", ".js"],
  ["image/gif", ".gif"],
  ["image/jpeg", ".jpg"],
  ["image/png", ".png"],
  ["image/x-png", ".png"],
  ["image/svg+xml", ".svg"],
  ["image/webp", ".webp"],
  ["image/x-icon", ".ico"],
  ["image/vnd.microsoft.icon", ".ico"],
  ["font/woff", ".woff"],
  ["font/woff2", ".woff2"]
]);

// The media type without parameters, lower-cased: "Text/HTML; charset=x" -> "text/html".
export const mediaTypeOf = (contentType: string) =>
  (/^[^ ;]+/.exec(contentType)?.[0] ?? "").toLowerCase();

export const extensionFromContentType = (contentType?: string | null) => {
  if (!contentType) {
    return DEFAULT_EXTENSION;
  }
  return EXTENSION_BY_MEDIA_TYPE.get(mediaTypeOf(contentType)) ?? DEFAULT_EXTENSION;
};

export const isHtmlContentType = (contentType: string) => /text\/html/i.test(contentType);

export const isCssContentType = (contentType: string) => /text\/css/i.test(contentType);

export const isTextResponse = (contentType: string) => !isBinaryContentType(contentType);
