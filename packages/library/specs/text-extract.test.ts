import assert from "node:assert/strict";
import { test } from "node:test";

import { decodeEntities, extractPlainText } from "../src/text-extract";

const PAGE =
  "<html><head><style>p{color:red}</style><script>var x = 1;</script></head>" +
  '<body><p class="a">Fish &amp; Chips</p></body></html>';

test("drops scripts, styles and tags, leaving a space per tag", () => {
  assert.equal(extractPlainText(PAGE), "     Fish & Chips   ");
});

test("collapses whitespace runs on request", () => {
  assert.equal(extractPlainText(PAGE, { collapseWhitespace: true }), " Fish & Chips ");
  assert.equal(
    extractPlainText("<p>one\n\ttwo</p>", { collapseWhitespace: true }),
    " one two "
  );
});

test("decodeEntities resolves named entities", () => {
  assert.equal(decodeEntities("&lt;b&gt; &eacute;"), "<b> é");
});
