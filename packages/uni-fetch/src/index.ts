import got, { type Agents, RequestError } from "got";
import { HttpProxyAgent, HttpsProxyAgent } from "hpagent";
import iconv from "iconv-lite";

export type UniFetchOptions = {
  userAgent?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  defaultEncoding?: string;
  forcedEncoding?: string;
  username?: string;
  password?: string;
  keepCookies?: boolean;
  /** Routes every request through this HTTP proxy, e.g. `http://proxy.local:3128`. */
  proxyUrl?: string;
  proxyUsername?: string;
  proxyPassword?: string;
};

export type FetchRequestOptions = {
  ifModifiedSince?: Date;
};

export type FetchedResource = {
  bytes: Uint8Array;
  contentType: string;
  contentLocation?: string;
  detectedEncoding?: string;
  isBinary: boolean;
  statusCode: number;
};

export const DEFAULT_USER_AGENT =
  "Mozilla/4.0 (compatible; MSIE 6.0; Windows NT 5.1; SV1)";
export const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_ENCODING = "windows-1252";

const HEADER_CHARSET_PATTERN = /charset=([^;"'/>]+)/i;
const META_CHARSET_PATTERN = /<meta[^>]+content-type[^>]+charset=([^;"'/>]+)/i;

export class TransportError extends Error {
  readonly name = "TransportError";
  readonly kind = "transport";

  constructor(
    public readonly url: string,
    message: string,
    public readonly statusCode?: number,
    public readonly cause?: unknown
  ) {
    super(message);
  }

  get notModified(): boolean {
    return this.statusCode === 304;
  }
}

// An empty content type is treated as text.
export function isBinaryContentType(contentType: string): boolean {
  if (!contentType) {
    return false;
  }
  return !contentType.toLowerCase().includes("text");
}

function charsetToEncoding(charset: string | undefined): string | undefined {
  const name = charset?.trim().toLowerCase();
  if (!name || !iconv.encodingExists(name)) {
    return undefined;
  }
  return name;
}

/**
 * Picks the charset of a text response: the Content-Type header first, then a
 * `<meta http-equiv="content-type">` tag in the body read as ASCII, then the
 * fallback. Unknown charset names are skipped.
 */
export function detectEncoding(
  contentType: string,
  bytes: Uint8Array,
  fallback: string = DEFAULT_ENCODING
): string {
  const fromHeader = charsetToEncoding(HEADER_CHARSET_PATTERN.exec(contentType)?.[1]);
  if (fromHeader) {
    return fromHeader;
  }
  const asciiBody = Buffer.from(bytes).toString("latin1");
  const fromMeta = charsetToEncoding(META_CHARSET_PATTERN.exec(asciiBody)?.[1]);
  return fromMeta ?? fallback;
}

export function captureCookie(cookieStore: Map<string, string>, cookieValue: string): void {
  const [pair] = cookieValue.split(";");
  if (!pair) {
    return;
  }
  const separatorIndex = pair.indexOf("=");
  if (separatorIndex <= 0) {
    return;
  }
  const name = pair.slice(0, separatorIndex).trim();
  const value = pair.slice(separatorIndex + 1).trim();
  if (!name) {
    return;
  }
  cookieStore.set(name, value);
}

export function serializeCookies(cookieStore: Map<string, string>): string {
  return Array.from(cookieStore.entries())
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

function headerValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

// Credentials given separately override any in the proxy URL.
const createProxyAgents = (options: UniFetchOptions): Agents | undefined => {
  if (!options.proxyUrl) {
    return undefined;
  }
  const proxy = new URL(options.proxyUrl);
  if (options.proxyUsername) {
    proxy.username = options.proxyUsername;
  }
  if (options.proxyPassword) {
    proxy.password = options.proxyPassword;
  }
  return {
    http: new HttpProxyAgent({ proxy }),
    https: new HttpsProxyAgent({ proxy })
  };
};

export class UniFetchTransport {
  private readonly cookieStore = new Map<string, string>();
  private readonly agent?: Agents;

  constructor(private readonly options: UniFetchOptions = {}) {
    this.agent = createProxyAgents(options);
  }

  async fetch(url: string, requestOptions: FetchRequestOptions = {}): Promise<FetchedResource> {
    const headers: Record<string, string> = {
      "user-agent": this.options.userAgent ?? DEFAULT_USER_AGENT,
      "accept-encoding": "gzip, deflate, br",
      ...this.options.headers
    };
    if (requestOptions.ifModifiedSince) {
      headers["if-modified-since"] = requestOptions.ifModifiedSince.toUTCString();
    }
    if (this.options.keepCookies && this.cookieStore.size > 0) {
      headers.cookie = serializeCookies(this.cookieStore);
    }

    const response = await got(url, {
      headers,
      ...(this.options.username ? { username: this.options.username } : {}),
      ...(this.options.password ? { password: this.options.password } : {}),
      ...(this.agent ? { agent: this.agent } : {}),
      responseType: "buffer",
      decompress: true,
      followRedirect: true,
      throwHttpErrors: false,
      retry: { limit: 0 },
      timeout: { request: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS }
    }).catch((error: unknown) => {
      const message = error instanceof RequestError ? error.message : String(error);
      throw new TransportError(url, `Request to ${url} failed: ${message}`, undefined, error);
    });

    if (this.options.keepCookies) {
      for (const cookie of response.headers["set-cookie"] ?? []) {
        captureCookie(this.cookieStore, cookie);
      }
    }

    if (response.statusCode === 304) {
      throw new TransportError(url, `${url} was not modified`, 304);
    }
    if (response.statusCode < 200 || response.statusCode >= 300) {
      const statusText = response.statusMessage ? ` ${response.statusMessage}` : "";
      throw new TransportError(url, `HTTP ${response.statusCode}${statusText}`, response.statusCode);
    }

    const bytes = new Uint8Array(response.body);
    const contentType = headerValue(response.headers["content-type"]) ?? "";
    const contentLocation = headerValue(response.headers["content-location"]) || undefined;
    const isBinary = isBinaryContentType(contentType);
    const detectedEncoding = isBinary
      ? undefined
      : this.options.forcedEncoding ??
        detectEncoding(contentType, bytes, this.options.defaultEncoding ?? DEFAULT_ENCODING);

    return {
      bytes,
      contentType,
      contentLocation,
      detectedEncoding,
      isBinary,
      statusCode: response.statusCode
    };
  }
}

export async function uniFetch(
  url: string,
  options: UniFetchOptions = {},
  requestOptions: FetchRequestOptions = {}
): Promise<FetchedResource> {
  return new UniFetchTransport(options).fetch(url, requestOptions);
}
