// `@import "/a.css"`, `background: url(/a.png)`, `list-style-image: url('/a.png')`.
// Absolute, data: and protocol-relative references are left alone. The closing
// delimiter never reaches past the `)`, so a quoted style attribute stays closed.
const CSS_ROOT_RELATIVE_PATTERN =
  /(?<attrib>@import\s|\S+-image:|background:)\s*?(?:url)*['"(]{1,2}(?!http|data:|\s*\/\/)\s*\/(?<url>[^"')]+)(?:["']\)|\)|["'])/gi;
const CSS_FOLDER_RELATIVE_PATTERN =
  /(?<attrib>@import\s|\S+-image:|background:)\s*?(?:url)*['"(]{1,2}(?!http|data:|\s*\/\/)\s*(?<url>[^"')]+)(?:["']\)|\)|["'])/gi;

const rewriteMatches = (text: string, pattern: RegExp, prefix: string) => {
  let updated = "";
  let lastIndex = 0;
  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    const attrib = match.groups?.attrib ?? "";
    const url = match.groups?.url ?? "";
    updated += text.slice(lastIndex, index);
    updated += `${attrib} url(${prefix}/${url})`;
    lastIndex = index + match[0].length;
  }
  return updated + text.slice(lastIndex);
};

/**
 * Rewrites site-relative and folder-relative CSS references to absolute
 * `url(...)` form. Works on stylesheets and on HTML with inline styles.
 */
export const absolutizeCssReferences = (text: string, root: string, folder: string) => {
  const rootRewritten = rewriteMatches(text, CSS_ROOT_RELATIVE_PATTERN, root);
  return rewriteMatches(rootRewritten, CSS_FOLDER_RELATIVE_PATTERN, folder);
};
