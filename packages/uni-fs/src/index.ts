import { access, mkdir, readFile, readdir, rm, rmdir, unlink, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

export type WriteData = ArrayBuffer | Uint8Array | Blob | string;

async function dataToNodeWritable(data: WriteData): Promise<string | Uint8Array> {
  if (typeof data === "string") {
    return data;
  }
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (typeof Blob !== "undefined" && data instanceof Blob) {
    return new Uint8Array(await data.arrayBuffer());
  }
  throw new Error("Unsupported data type.");
}

// Relative paths are taken against the working directory at call time.
function toNodePath(filePath: string): string {
  return resolve(process.cwd(), filePath);
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await access(toNodePath(filePath));
    return true;
  } catch {
    return false;
  }
}

export async function readBinary(filePath: string): Promise<Uint8Array> {
  const buffer = await readFile(toNodePath(filePath));
  return new Uint8Array(buffer);
}

export async function readText(filePath: string): Promise<string> {
  return readFile(toNodePath(filePath), "utf-8");
}

export async function write(filePath: string, data: WriteData): Promise<void> {
  const outputPath = toNodePath(filePath);
  await mkdir(dirname(outputPath), { recursive: true });
  const writableData = await dataToNodeWritable(data);
  await writeFile(outputPath, writableData);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(toNodePath(dirPath), { recursive: true });
}

export async function list(dirPath: string): Promise<string[]> {
  const entries = await readdir(toNodePath(dirPath));
  return entries.sort();
}

export async function remove(filePath: string): Promise<void> {
  await unlink(toNodePath(filePath));
}

/**
 * Removes a directory. Without `recursive` the directory must be empty,
 * which lets callers prune only what they emptied themselves.
 */
export async function removeDir(
  dirPath: string,
  options: { recursive?: boolean } = {}
): Promise<void> {
  const target = toNodePath(dirPath);
  if (options.recursive) {
    await rm(target, { recursive: true, force: true });
    return;
  }
  await rmdir(target);
}

export { remove as delete };
