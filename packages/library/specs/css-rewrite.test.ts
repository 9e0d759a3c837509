import assert from "node:assert/strict";
import { test } from "node:test";

import { absolutizeCssReferences } from "../src/css-rewrite";

const ROOT = "http://example.com";
const FOLDER = "http://example.com/css";

test("rewrites a site-relative @import", () => {
  assert.equal(
    absolutizeCssReferences('@import "/styles/base.css";', ROOT, FOLDER),
    "@import  url(http://example.com/styles/base.css);"
  );
});

test("rewrites a folder-relative background image", () => {
  assert.equal(
    absolutizeCssReferences(".hero { background-image: url('img/hero.png'); }", ROOT, FOLDER),
    ".hero { background-image: url(http://example.com/css/img/hero.png); }"
  );
});

test("keeps absolute and data references", () => {
  const css =
    'body { background: url("http://cdn.example.com/bg.gif"); } ' +
    "i { background: url(data:image/png;base64,AAAA); }";
  assert.equal(absolutizeCssReferences(css, ROOT, FOLDER), css);
});

test("keeps protocol-relative references", () => {
  const css = "b { background: url(//cdn.example.com/bg.gif); }";
  assert.equal(absolutizeCssReferences(css, ROOT, FOLDER), css);
});
