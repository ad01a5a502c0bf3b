import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, test } from "node:test";
import {
  TYPES_PLACEHOLDER,
  escapeHtml,
  loadHtmlTemplate,
  renderHtml,
  renderTypeList,
  writeHtmlReport,
} from "../src/render/html.js";
import { describeNode } from "../src/render/labels.js";
import { renderJson, renderText } from "../src/render/text.js";
import type { TypeRecord } from "../src/types.js";

const shape: TypeRecord = {
  name: "Shape",
  size: 16,
  alignment: 8,
  children: [
    { kind: "discriminant", size: 1 },
    { kind: "variant", name: "Circle", size: 8, children: [{ kind: "field", name: ".0", size: 8 }] },
    { kind: "variant", name: "Empty", size: 0 },
  ],
};

const unit: TypeRecord = { name: "Unit", size: 0, alignment: 1, children: [] };

describe("describeNode", () => {
  test("labels every kind", () => {
    assert.equal(describeNode({ kind: "discriminant", size: 1 }), "Discriminant: 1 bytes");
    assert.equal(describeNode({ kind: "padding", size: 3 }), "Padding: 3 bytes");
    assert.equal(describeNode({ kind: "endPadding", size: 7 }), "End padding: 7 bytes");
    assert.equal(describeNode({ kind: "variant", name: "None", size: 0 }), "Variant None: 0 bytes");
  });

  test("field prints a zero offset", () => {
    assert.equal(
      describeNode({ kind: "field", name: "a", size: 4, offset: 0, alignment: 4 }),
      "Field a: 4 bytes, offset: 0 bytes, alignment: 4 bytes",
    );
    assert.equal(describeNode({ kind: "field", name: "b", size: 4 }), "Field b: 4 bytes");
  });
});

describe("renderText", () => {
  test("indents nested members", () => {
    assert.equal(
      renderText([shape]),
      [
        "Type Shape: 16 bytes, alignment 8 bytes",
        "  Discriminant: 1 bytes",
        "  Variant Circle: 8 bytes",
        "    Field .0: 8 bytes",
        "  Variant Empty: 0 bytes",
        "",
      ].join("\n"),
    );
  });

  test("empty list renders nothing", () => {
    assert.equal(renderText([]), "");
  });
});

describe("renderJson", () => {
  test("omits absent variant children", () => {
    const parsed: unknown = JSON.parse(renderJson([shape]));
    assert.deepStrictEqual(parsed, [shape]);
    assert.equal(renderJson([unit]).endsWith("]\n"), true);
  });
});

describe("renderTypeList", () => {
  test("type without members is a plain item", () => {
    assert.equal(renderTypeList([unit]), "<li>Type Unit: 0 bytes, alignment 1 bytes</li>");
  });

  test("nested members become a collapsible list", () => {
    const record: TypeRecord = {
      name: "Foo",
      size: 8,
      alignment: 8,
      children: [{ kind: "field", name: "a", size: 8, offset: 0 }],
    };
    assert.equal(
      renderTypeList([record]),
      [
        "<li>",
        '<span class="caret">Type Foo: 8 bytes, alignment 8 bytes</span>',
        '<ul class="nested">',
        "<li>Field a: 8 bytes, offset: 0 bytes</li>",
        "</ul>",
        "</li>",
      ].join("\n"),
    );
  });

  test("variant without children is not collapsible", () => {
    const html = renderTypeList([shape]);
    assert.equal(html.includes("<li>Variant Empty: 0 bytes</li>"), true);
    assert.equal(html.includes('<span class="caret">Variant Circle: 8 bytes</span>'), true);
  });

  test("escapes type names", () => {
    const record: TypeRecord = { name: "Option<&str>", size: 16, alignment: 8, children: [] };
    assert.equal(renderTypeList([record]), "<li>Type Option&lt;&amp;str&gt;: 16 bytes, alignment 8 bytes</li>");
  });
});

describe("renderHtml", () => {
  test("fills the placeholder", () => {
    assert.equal(renderHtml([unit], `<ul>${TYPES_PLACEHOLDER}</ul>`), "<ul><li>Type Unit: 0 bytes, alignment 1 bytes</li></ul>");
  });

  test("keeps replacement patterns in names literal", () => {
    const record: TypeRecord = { name: "$&", size: 1, alignment: 1, children: [] };
    assert.equal(renderHtml([record], TYPES_PLACEHOLDER), "<li>Type $&amp;: 1 bytes, alignment 1 bytes</li>");
  });

  test("requires the placeholder", () => {
    assert.throws(() => renderHtml([unit], "<ul></ul>"), /placeholder/);
  });

  test("bundled template has the placeholder", async () => {
    const template = await loadHtmlTemplate();
    assert.equal(template.includes(TYPES_PLACEHOLDER), true);
  });

  test("writes the report to disk", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "rust-type-sizes-"));
    try {
      const saved = await writeHtmlReport([unit], path.join(dir, "out.html"));
      assert.equal(saved, path.join(dir, "out.html"));
      const html = await readFile(saved, "utf8");
      assert.equal(html.includes("<li>Type Unit: 0 bytes, alignment 1 bytes</li>"), true);
      assert.equal(html.includes(TYPES_PLACEHOLDER), false);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("escapeHtml", () => {
  test("escapes markup and quotes", () => {
    assert.equal(escapeHtml(`<a href="x">'&'</a>`), "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });
});
