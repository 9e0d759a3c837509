import assert from "node:assert/strict";
import { test } from "node:test";

import {
  extensionFromContentType,
  isBinaryContentType,
  isCssContentType,
  isHtmlContentType,
  isTextResponse,
  mediaTypeOf
} from "../src/content-type";

test("extensionFromContentType maps known media types", () => {
  assert.equal(extensionFromContentType("text/html"), ".htm");
  assert.equal(extensionFromContentType("text/css"), ".css");
  assert.equal(extensionFromContentType("image/jpeg"), ".jpg");
  assert.equal(extensionFromContentType("image/x-png"), ".png");
  assert.equal(extensionFromContentType("application/x-javascript"), ".js");
});

test("extensionFromContentType ignores parameters and case", () => {
  assert.equal(mediaTypeOf("Text/HTML; charset=utf-8"), "text/html");
  assert.equal(extensionFromContentType("Image/GIF; foo=bar"), ".gif");
});

test("extensionFromContentType falls back to .htm", () => {
  assert.equal(extensionFromContentType("application/octet-stream"), ".htm");
  assert.equal(extensionFromContentType(undefined), ".htm");
  assert.equal(extensionFromContentType(""), ".htm");
});

test("html and css checks are case-insensitive", () => {
  assert.equal(isHtmlContentType("TEXT/HTML; charset=utf-8"), true);
  assert.equal(isHtmlContentType("text/css"), false);
  assert.equal(isCssContentType("Text/CSS"), true);
});

test("anything without text in its type is binary", () => {
  assert.equal(isBinaryContentType("image/png"), true);
  assert.equal(isBinaryContentType("application/javascript"), true);
  assert.equal(isBinaryContentType("text/plain"), false);
  assert.equal(isBinaryContentType(""), false);
  assert.equal(isTextResponse("text/css"), true);
  assert.equal(isTextResponse("image/gif"), false);
});
