import path from "node:path";

import type { StorageMode } from "@webfold/lib";
import { DEFAULT_TIMEOUT_MS } from "@webfold/uni-fetch";

import { ConfigError } from "./errors";

export const OUTPUT_FORMATS = ["mht", "html", "complete", "text"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const STORAGE_FLAGS = ["memory", "temporary", "permanent"] as const;
export type StorageFlag = (typeof STORAGE_FLAGS)[number];

const STORAGE_BY_FLAG: Record<StorageFlag, StorageMode> = {
  memory: "memory",
  temporary: "disk-temporary",
  permanent: "disk-permanent"
};

export type EnvConfig = {
  timeoutMs: number;
  headers?: Record<string, string>;
  proxyUrl?: string;
  proxyPassword?: string;
};

const isOneOf = <T extends string>(values: readonly T[], value: string): value is T =>
  values.some((candidate) => candidate === value);

export const parseFormat = (value: string): OutputFormat => {
  if (!isOneOf(OUTPUT_FORMATS, value)) {
    throw new ConfigError(
      `Unknown format "${value}"; expected one of ${OUTPUT_FORMATS.join(", ")}.`
    );
  }
  return value;
};

export const parseStorage = (value: string): StorageMode => {
  if (!isOneOf(STORAGE_FLAGS, value)) {
    throw new ConfigError(
      `Unknown storage "${value}"; expected one of ${STORAGE_FLAGS.join(", ")}.`
    );
  }
  return STORAGE_BY_FLAG[value];
};

export const parseTimeout = (raw: string | undefined) => {
  if (!raw) {
    return DEFAULT_TIMEOUT_MS;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Invalid WEBFOLD_FETCH_TIMEOUT_MS value "${raw}".`);
  }
  return value;
};

export const parseHeadersOverride = (raw: string | undefined) => {
  if (!raw) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError("Invalid WEBFOLD_FETCH_HEADERS JSON.");
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError("WEBFOLD_FETCH_HEADERS must be a JSON object.");
  }
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === undefined || value === null) {
      continue;
    }
    headers[key] = String(value);
  }
  return headers;
};

export const parseProxyUrl = (raw: string | undefined) => {
  if (!raw) {
    return undefined;
  }
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`Invalid proxy URL "${raw}".`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`Proxy URL "${raw}" must use http or https.`);
  }
  return raw;
};

export const readEnvConfig = (env: NodeJS.ProcessEnv): EnvConfig => ({
  timeoutMs: parseTimeout(env.WEBFOLD_FETCH_TIMEOUT_MS),
  headers: parseHeadersOverride(env.WEBFOLD_FETCH_HEADERS),
  proxyUrl: parseProxyUrl(env.WEBFOLD_PROXY_URL),
  proxyPassword: env.WEBFOLD_PROXY_PASSWORD || undefined
});

// No output path means "the current folder", where the page is named after its title.
export const resolveOutputPath = (output: string | undefined) => {
  const trimmed = output?.trim();
  return trimmed ? trimmed : `.${path.sep}`;
};

export const formatLogLine = (msg: string, meta?: Record<string, unknown>) => {
  if (!meta || Object.keys(meta).length === 0) {
    return msg;
  }
  const details = Object.entries(meta)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join(" ");
  return `${msg} (${details})`;
};
