import { absolutizeCssReferences } from "./css-rewrite";

const SKIPPED_SCHEMES = "https?:|ftp:|mailto:|javascript:|data:|\\/\\/";

const ATTRIBUTE_ROOT_RELATIVE_PATTERN = new RegExp(
  `(?<attrib>\\shref|\\ssrc|\\sbackground)\\s*?=\\s*?(?<delim1>["'\\\\]{0,2})` +
    `(?!\\s*\\+|#|${SKIPPED_SCHEMES})\\/(?<url>[^"'>\\\\]+)(?<delim2>["'\\\\]{0,2})`,
  "gi"
);
const ATTRIBUTE_FOLDER_RELATIVE_PATTERN = new RegExp(
  `(?<attrib>\\shref|\\ssrc|\\sbackground)\\s*?=\\s*?(?<delim1>["'\\\\]{0,2})` +
    `(?!\\s*\\+|#|${SKIPPED_SCHEMES})(?<url>[^"'>\\\\]+)(?<delim2>["'\\\\]{0,2})`,
  "gi"
);

const BASE_HREF_PATTERN = /<base[^>]+?href=['"]?([^'">]+)['"]?/i;
const BASE_TAG_PATTERN = /<base[^>]*?>/gi;
const DELIMITED_KEY_PATTERN = /^(["'(]*)([^'")]*)(["')]*)$/;

export type LocalPathResolver = (url: string) => string | undefined;

const rewriteAttributes = (html: string, pattern: RegExp, prefix: string) => {
  let updated = "";
  let lastIndex = 0;
  for (const match of html.matchAll(pattern)) {
    const index = match.index ?? 0;
    const groups = match.groups ?? {};
    updated += html.slice(lastIndex, index);
    updated += `${groups.attrib}=${groups.delim1 ?? ""}${prefix}/${groups.url}${groups.delim2 ?? ""}`;
    lastIndex = index + match[0].length;
  }
  return updated + html.slice(lastIndex);
};

/**
 * Turns `href="/a"`, `src="b.png"` and CSS `url(c.png)` references into
 * absolute URLs. Site-relative references get `root`, the rest get `folder`.
 */
export const toAbsolute = (content: string, root: string, folder: string) => {
  let updated = rewriteAttributes(content, ATTRIBUTE_ROOT_RELATIVE_PATTERN, root);
  updated = rewriteAttributes(updated, ATTRIBUTE_FOLDER_RELATIVE_PATTERN, folder);
  return absolutizeCssReferences(updated, root, folder);
};

/**
 * Replaces each delimited reference with the local path of the file it was
 * saved to. References the resolver does not know are kept.
 */
export const toLocal = (
  content: string,
  references: ReadonlyMap<string, string>,
  resolveLocalPath: LocalPathResolver
) => {
  let updated = content;
  for (const [key, url] of references) {
    const localPath = resolveLocalPath(url);
    if (!localPath) {
      continue;
    }
    const match = DELIMITED_KEY_PATTERN.exec(key);
    const replacement = match ? `${match[1]}${localPath}${match[3]}` : localPath;
    updated = updated.split(key).join(replacement);
  }
  return updated;
};

export const readBaseHref = (html: string) => BASE_HREF_PATTERN.exec(html)?.[1];

export const removeBaseTags = (html: string) => html.replace(BASE_TAG_PATTERN, "");

export const stripHtmlTag = (tagName: string, html: string) =>
  html.replace(new RegExp(`<${tagName}[^>]*?>[\\s\\S]*?</${tagName}>`, "gi"), "");

// "Mark of the web": lets a saved page run with the permissions of the zone it came from.
export const addWebMark = (html: string, url: string) =>
  `<!-- saved from url=(${String(url.length).padStart(4, "0")})${url} --> \r\n${html}`;
