import { describe, expect, it } from "vitest";
import { countNonWhitespace, markdownNormalizer, selectBodyText, stripTags } from "./html.js";

describe("markdownNormalizer", () => {
  it("renders headings and emphasis as Markdown", () => {
    expect(markdownNormalizer("<h1>Title</h1><p>Body <strong>bold</strong></p>")).toBe("# Title\n\nBody **bold**");
  });

  it("drops script content", () => {
    expect(markdownNormalizer("<p>Visible</p><script>alert(1)</script>")).toBe("Visible");
  });
});

describe("stripTags", () => {
  it("maps block elements to line structure", () => {
    expect(stripTags("<h2>Title</h2><p>One &amp; two</p><ul><li>a</li><li>b</li></ul>")).toBe(
      "## Title\n\nOne & two\n\n- a\n\n- b"
    );
  });

  it("unescapes &amp; last", () => {
    expect(stripTags("<p>&amp;lt;tag&amp;gt;</p>")).toBe("&lt;tag&gt;");
  });

  it("removes style blocks", () => {
    expect(stripTags("<style>p { color: red }</style><div>Text</div>")).toBe("Text");
  });
});

describe("selectBodyText", () => {
  it("uses the plain part when there is no rich part", () => {
    expect(selectBodyText("plain", undefined)).toBe("plain");
  });

  it("falls back to the plain part when the conversion is near-empty", () => {
    expect(selectBodyText("fallback plain", "<p>Hi</p>")).toBe("fallback plain");
  });

  it("keeps a short conversion when there is no plain part", () => {
    expect(selectBodyText("", "<p>Hi</p>")).toBe("Hi");
  });

  it("uses the tag stripper when the normalizer throws", () => {
    const failing = (): string => {
      throw new Error("converter unavailable");
    };
    expect(selectBodyText("plain", "<p>Converted by the stripper</p>", failing)).toBe("Converted by the stripper");
  });

  it("counts non-whitespace characters", () => {
    expect(countNonWhitespace(" a b\n c ")).toBe(3);
  });
});
