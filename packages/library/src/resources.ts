const ABSOLUTE_URL_PATTERN = /^https?:\/\/\w+/i;

type ReferencePattern = {
  pattern: RegExp;
  read: (match: RegExpMatchArray) => { key: string; url: string } | undefined;
};

const REFERENCE_PATTERNS: ReferencePattern[] = [
  {
    // src='a.png', background="b.gif", src=c.jpg
    pattern: /(?:\ssrc|\sbackground)\s*=\s*(?:'([^']+)'|"([^"]+)"|([^ \n\r\f]+))/gi,
    read: (match) => {
      if (match[1] !== undefined) return { key: `'${match[1]}'`, url: match[1] };
      if (match[2] !== undefined) return { key: `"${match[2]}"`, url: match[2] };
      if (match[3] !== undefined) return { key: match[3], url: match[3] };
      return undefined;
    }
  },
  {
    // @import "a.css", @import url(a.css), background-image: url('a.png')
    pattern: /(?:@import\s|\S+-image:|background:)\s*?(?:url)*\s*?(["'(]{1,2}([^"')]+)["')]{1,2})/gi,
    read: (match) =>
      match[1] !== undefined && match[2] !== undefined
        ? { key: match[1], url: match[2] }
        : undefined
  },
  {
    // <link rel="stylesheet" href="a.css">
    pattern: /<link[^>]+?href\s*=\s*((['"])*([^'">]+)(['"])*)/gi,
    read: (match) =>
      match[1] !== undefined && match[3] !== undefined
        ? { key: match[1], url: match[3] }
        : undefined
  },
  {
    // <iframe src="a.htm">, <frame src=b.htm>
    pattern: /<i*frame[^>]+?src\s*=\s*(['"]?([^'"\\>]+)['"]?)/gi,
    read: (match) =>
      match[1] !== undefined && match[2] !== undefined
        ? { key: match[1], url: match[2] }
        : undefined
  }
];

export type ReferenceLogger = (msg: string, meta?: Record<string, unknown>) => void;

/**
 * Collects the external references of an HTML or CSS document. Keys are the
 * matched text including its quotes or parentheses; values are the bare URLs.
 * Only absolute http(s) URLs are kept and the first occurrence of a key wins.
 */
export const extractReferences = (content: string, onLog?: ReferenceLogger) => {
  const references = new Map<string, string>();
  for (const { pattern, read } of REFERENCE_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const reference = read(match);
      if (!reference || references.has(reference.key)) {
        continue;
      }
      if (!ABSOLUTE_URL_PATTERN.test(reference.url)) {
        onLog?.("Skipped a reference that is not an absolute http(s) URL", {
          url: reference.url
        });
        continue;
      }
      references.set(reference.key, reference.url);
    }
  }
  return references;
};
