import assert from "node:assert/strict";
import { test } from "node:test";

import { extractReferences } from "../src/resources";

const PAGE = [
  '<img src="http://example.com/a.png">',
  "<img src='http://example.com/b.png'>",
  "<td background=http://example.com/c.gif width=1>",
  '<img src="relative.png">',
  '<img src="http://example.com/a.png">',
  '<link rel="stylesheet" href="http://example.com/s.css">',
  '<iframe src="http://example.com/frame.htm"></iframe>',
  "<style>@import url(http://example.com/i.css);</style>"
].join("\n");

test("collects every delimited reference once, keyed by its matched text", () => {
  assert.deepEqual(Array.from(extractReferences(PAGE).entries()), [
    ['"http://example.com/a.png"', "http://example.com/a.png"],
    ["'http://example.com/b.png'", "http://example.com/b.png"],
    ["http://example.com/c.gif", "http://example.com/c.gif"],
    ['"http://example.com/frame.htm"', "http://example.com/frame.htm"],
    ["(http://example.com/i.css)", "http://example.com/i.css"],
    ['"http://example.com/s.css"', "http://example.com/s.css"]
  ]);
});

test("logs references that are not absolute http urls", () => {
  const skipped: unknown[] = [];
  extractReferences('<img src="relative.png"><img src="ftp://example.com/x.png">', (_msg, meta) => {
    skipped.push(meta?.url);
  });
  assert.deepEqual(skipped, ["relative.png", "ftp://example.com/x.png"]);
});

test("returns an empty map for content without references", () => {
  assert.equal(extractReferences("<p>plain</p>").size, 0);
});
