import assert from "node:assert/strict";
import { test } from "node:test";

import { InvalidExtensionError, InvalidFileNameError } from "../src/errors";
import { filenameFromUrl, sanitizeFilename, validateOutputPath } from "../src/filename";
import { hashString } from "../src/utils";

test("sanitizeFilename removes reserved characters and squeezes spaces", () => {
  assert.equal(sanitizeFilename('  My: "Page" <1>  '), "My Page 1");
  assert.equal(sanitizeFilename("a    b"), "a b");
});

test("filenameFromUrl uses the last path segment", () => {
  assert.equal(
    filenameFromUrl("http://example.com/images/logo.gif", { extension: ".gif" }),
    "logo.gif"
  );
});

test("urls that differ only in their query get distinct names", () => {
  const first = filenameFromUrl("http://example.com/page?id=1", { extension: ".htm" });
  const second = filenameFromUrl("http://example.com/page?id=2", { extension: ".htm" });
  assert.equal(first, `page_${hashString("?id=1")}.htm`);
  assert.notEqual(first, second);
});

test("filenameFromUrl falls back to the title, then to a hash of the url", () => {
  assert.equal(
    filenameFromUrl("http://example.com/", { extension: ".htm", title: "Home" }),
    "Home.htm"
  );
  assert.equal(
    filenameFromUrl("http://example.com/", { extension: ".htm" }),
    `${hashString("http://example.com/")}.htm`
  );
});

test("validateOutputPath accepts listed extensions in any case and folders", () => {
  assert.doesNotThrow(() => validateOutputPath("out/page.htm", [".htm", ".html"]));
  assert.doesNotThrow(() => validateOutputPath("out/page.HTML", [".htm", ".html"]));
  assert.doesNotThrow(() => validateOutputPath("out/", [".htm"]));
});

test("validateOutputPath rejects missing and unlisted extensions", () => {
  assert.throws(() => validateOutputPath("out/page", [".htm"]), InvalidFileNameError);
  assert.throws(
    () => validateOutputPath("out/page.txt", [".htm"]),
    (error: unknown) => error instanceof InvalidExtensionError && error.extension === ".txt"
  );
});
