import * as cheerio from "cheerio";

import { stripHtmlTag } from "./rewrite-links";

const TAG_PATTERN =
  /<\w+(\s+[A-Za-z0-9_-]+\s*=\s*("([^"]*)"|'([^']*)'))*\s*(\/)*>|<[^>]+>/g;

export type PlainTextOptions = {
  collapseWhitespace?: boolean;
};

export const decodeEntities = (text: string) => cheerio.load(text, null, false).root().text();

export const extractPlainText = (html: string, options: PlainTextOptions = {}) => {
  let text = stripHtmlTag("script", html);
  text = stripHtmlTag("style", text);
  text = decodeEntities(text.replace(TAG_PATTERN, " "));
  if (options.collapseWhitespace) {
    text = text.replace(/[\n\r\f\t]/g, " ").replace(/ {2,}/g, " ");
  }
  return text;
};
