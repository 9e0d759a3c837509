import { nodeFileSystem } from "../src/file-system";
import { isBinaryContentType } from "../src/content-type";
import type { FetchedResource, NodeContext, Transport } from "../src/types";

export type MockResponse = {
  body: string | Uint8Array;
  contentType: string;
  encoding?: string;
  contentLocation?: string;
};

export const createMockTransport = (responses: Record<string, MockResponse>) => {
  const table = new Map(Object.entries(responses));
  const requests: string[] = [];
  const transport: Transport = {
    async fetch(url: string): Promise<FetchedResource> {
      requests.push(url);
      const response = table.get(url);
      if (!response) {
        throw new Error(`HTTP 404 Not Found`);
      }
      const bytes =
        typeof response.body === "string"
          ? new Uint8Array(Buffer.from(response.body, "latin1"))
          : response.body;
      const isBinary = isBinaryContentType(response.contentType);
      return {
        bytes,
        contentType: response.contentType,
        contentLocation: response.contentLocation,
        detectedEncoding: isBinary ? undefined : response.encoding ?? "windows-1252",
        isBinary,
        statusCode: 200
      };
    }
  };
  const countOf = (url: string) => requests.filter((request) => request === url).length;
  return { transport, requests, countOf };
};

export const createContext = (
  transport: Transport,
  overrides: Partial<NodeContext> = {}
): NodeContext & { warnings: string[] } => {
  const warnings: string[] = [];
  return {
    transport,
    fs: nodeFileSystem,
    addWebMark: false,
    stripScripts: false,
    stripIframes: false,
    onWarning: (message) => {
      warnings.push(message);
    },
    ...overrides,
    warnings
  };
};
