import assert from "node:assert/strict";
import { access, mkdir, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, test } from "node:test";

import {
  delete as deleteFile,
  ensureDir,
  exists,
  list,
  readBinary,
  readText,
  removeDir,
  write
} from "../src/index";

let originalCwd = "";
let tempDir = "";

beforeEach(async () => {
  originalCwd = process.cwd();
  tempDir = await mkdtemp(join(tmpdir(), "uni-fs-"));
  process.chdir(tempDir);
});

afterEach(async () => {
  process.chdir(originalCwd);
  await rm(tempDir, { recursive: true, force: true });
});

test("write() creates parent folders and readText() reads it back", async () => {
  await write("nested/dir/page.htm", "<p>hello</p>");

  const saved = await readFile(join(tempDir, "nested", "dir", "page.htm"), "utf-8");
  assert.equal(saved, "<p>hello</p>");
  assert.equal(await readText("nested/dir/page.htm"), "<p>hello</p>");
});

test("write() accepts Uint8Array and delete() removes the file", async () => {
  const bytes = new Uint8Array([1, 2, 3, 250]);
  await write("blob.bin", bytes);

  assert.deepEqual(await readBinary("blob.bin"), bytes);
  assert.equal(await exists("blob.bin"), true);

  await deleteFile("blob.bin");
  assert.equal(await exists("blob.bin"), false);
  await assert.rejects(() => access(join(tempDir, "blob.bin")));
});

test("write() accepts ArrayBuffer and Blob data", async () => {
  const buffer = new ArrayBuffer(2);
  new Uint8Array(buffer).set([7, 8]);
  await write("a.bin", buffer);
  await write("b.txt", new Blob(["blob text"]));

  assert.deepEqual(await readBinary("a.bin"), new Uint8Array([7, 8]));
  assert.equal(await readText("b.txt"), "blob text");
});

test("absolute paths bypass the working directory", async () => {
  const target = join(tempDir, "abs", "file.txt");
  await write(target, "x");
  assert.equal(await readText(target), "x");
});

test("list() returns sorted entry names", async () => {
  await write("folder/b.txt", "b");
  await write("folder/a.txt", "a");
  await ensureDir("folder/c");

  assert.deepEqual(await list("folder"), ["a.txt", "b.txt", "c"]);
});

test("removeDir() refuses a non-empty folder unless recursive", async () => {
  await write("full/one.txt", "1");
  await mkdir(join(tempDir, "empty"));

  await removeDir("empty");
  assert.equal(await exists("empty"), false);

  await assert.rejects(() => removeDir("full"));
  await removeDir("full", { recursive: true });
  assert.equal(await exists("full"), false);
});
