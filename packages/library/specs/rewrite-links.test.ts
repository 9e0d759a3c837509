import assert from "node:assert/strict";
import { describe, test } from "node:test";

import { extractReferences } from "../src/resources";
import {
  addWebMark,
  readBaseHref,
  removeBaseTags,
  stripHtmlTag,
  toAbsolute,
  toLocal
} from "../src/rewrite-links";

const ROOT = "http://example.com";
const FOLDER = "http://example.com/docs";

describe("toAbsolute", () => {
  test("prefixes site-relative and folder-relative attributes", () => {
    const html =
      '<img src="/a.png"><a href=\'page.htm\'>x</a>' +
      '<script src="http://cdn.example.com/x.js"></script>';
    assert.equal(
      toAbsolute(html, ROOT, FOLDER),
      '<img src="http://example.com/a.png"><a href=\'http://example.com/docs/page.htm\'>x</a>' +
        '<script src="http://cdn.example.com/x.js"></script>'
    );
  });

  test("leaves anchors, mail links and protocol-relative references alone", () => {
    const html =
      '<a href="#top">t</a><a href="mailto:me@example.com">m</a>' +
      '<script src="//cdn.example.com/lib.js"></script>';
    assert.equal(toAbsolute(html, ROOT, FOLDER), html);
  });

  test("rewrites inline style backgrounds and keeps the attribute closed", () => {
    assert.equal(
      toAbsolute('<div style="background:url(img/bg.png)">x</div>', ROOT, FOLDER),
      '<div style="background: url(http://example.com/docs/img/bg.png)">x</div>'
    );
  });

  test("output references are all absolute", () => {
    const rewritten = toAbsolute('<img src="/a.png"><img src="b/c.png">', "http://x.com", "http://x.com");
    assert.deepEqual(Array.from(extractReferences(rewritten).values()), [
      "http://x.com/a.png",
      "http://x.com/b/c.png"
    ]);
  });
});

describe("toLocal", () => {
  const paths = new Map([
    ["http://example.com/a.png", "page_files/a.png"],
    ["http://example.com/s.css", "page_files/s.css"],
    ["http://example.com/b.png", "page_files/b.png"],
    ["http://example.com/c.png", "page_files/c.png"]
  ]);
  const resolve = (url: string) => paths.get(url);

  test("replaces quoted references and keeps their quotes", () => {
    const html = "<img src=\"http://example.com/a.png\"><link href='http://example.com/s.css'>";
    assert.equal(
      toLocal(html, extractReferences(html), resolve),
      "<img src=\"page_files/a.png\"><link href='page_files/s.css'>"
    );
  });

  test("replaces css url references with and without quotes", () => {
    const css =
      'div { background: url(http://example.com/b.png) } ' +
      'p { background: url("http://example.com/c.png") }';
    assert.equal(
      toLocal(css, extractReferences(css), resolve),
      'div { background: url(page_files/b.png) } p { background: url("page_files/c.png") }'
    );
  });

  test("keeps references the resolver does not know", () => {
    const html = '<img src="http://example.com/unknown.png">';
    assert.equal(toLocal(html, extractReferences(html), resolve), html);
  });
});

test("readBaseHref and removeBaseTags", () => {
  const html = '<head><base href="http://example.com/sub/"></head>';
  assert.equal(readBaseHref(html), "http://example.com/sub/");
  assert.equal(removeBaseTags(html), "<head></head>");
  assert.equal(readBaseHref("<head></head>"), undefined);
});

test("stripHtmlTag removes elements with their content in any case", () => {
  assert.equal(
    stripHtmlTag("script", '<p>a</p><SCRIPT type="x">var a = "<b>";</SCRIPT><p>b</p>'),
    "<p>a</p><p>b</p>"
  );
});

test("addWebMark prefixes the url with its padded length", () => {
  assert.equal(
    addWebMark("<html>", "http://example.com/"),
    "<!-- saved from url=(0019)http://example.com/ --> \r\n<html>"
  );
});
