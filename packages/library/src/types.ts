import type { FetchedResource, FetchRequestOptions } from "@webfold/uni-fetch";

export type { FetchedResource, FetchRequestOptions };

export type StorageMode = "memory" | "disk-temporary" | "disk-permanent";

export type NodeState =
  | { kind: "not-fetched" }
  | { kind: "fetched" }
  | { kind: "failed"; error: unknown };

export type LogHandler = (msg: string, meta?: Record<string, unknown>) => void;

export interface Transport {
  fetch(url: string, options?: FetchRequestOptions): Promise<FetchedResource>;
}

export interface FileSystem {
  exists(path: string): Promise<boolean>;
  readBinary(path: string): Promise<Uint8Array>;
  readText(path: string): Promise<string>;
  write(path: string, data: Uint8Array | string): Promise<void>;
  ensureDir(path: string): Promise<void>;
  list(path: string): Promise<string[]>;
  remove(path: string): Promise<void>;
  removeDir(path: string, options?: { recursive?: boolean }): Promise<void>;
}

export type ArchiveIdentity = {
  user: string;
  machine: string;
};

export type ProcessingOptions = {
  addWebMark: boolean;
  stripScripts: boolean;
  stripIframes: boolean;
  textEncoding?: string;
};

export type NodeContext = ProcessingOptions & {
  transport: Transport;
  fs: FileSystem;
  onLog?: LogHandler;
  onWarning?: (message: string) => void;
};

export interface BuilderOptions {
  transport?: Transport;
  fs?: FileSystem;
  /** Overrides every detected text encoding. */
  textEncoding?: string;
  addWebMark?: boolean;
  stripScripts?: boolean;
  stripIframes?: boolean;
  allowRecursion?: boolean;
  identity?: ArchiveIdentity;
  now?: () => Date;
  onLog?: LogHandler;
}
