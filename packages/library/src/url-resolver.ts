import { InvalidUrlError } from "./errors";

// A trailing `#fragment` on the last path segment; fragments holding `/`, `?` or `.` stay.
const TRAILING_FRAGMENT_PATTERN = /\/[^/]*?(#[^/?.]+)$/;
const URL_ROOT_PATTERN = /https?:\/\/[^/'"]+/i;

export type ResolveUrlOptions = {
  validate?: boolean;
};

export type UrlParts = {
  root: string;
  folder: string;
};

export const stripFragment = (url: string) => {
  const fragment = TRAILING_FRAGMENT_PATTERN.exec(url)?.[1];
  return fragment ? url.replace(fragment, "") : url;
};

export const resolveUrl = (raw: string, options: ResolveUrlOptions = {}) => {
  if (options.validate === false) {
    return raw;
  }
  let canonical: string;
  try {
    canonical = new URL(raw).toString();
  } catch {
    throw new InvalidUrlError(raw);
  }
  return stripFragment(canonical);
};

// Server-reported locations are taken as they are; relative ones are read against the request URL.
export const resolveContentLocation = (location: string, requestUrl: string) => {
  try {
    return new URL(location, requestUrl).toString();
  } catch {
    return location;
  }
};

export const decomposeUrl = (url: string): UrlParts => {
  const root = URL_ROOT_PATTERN.exec(url)?.[0] ?? "";
  const lastSlash = url.lastIndexOf("/");
  const folder = lastSlash > 7 ? url.slice(0, lastSlash) : root;
  return { root, folder };
};
