// Rich-to-plain body conversion.
// The default normalizer renders HTML as Markdown with turndown. When a
// normalizer throws, the built-in tag stripper below is used instead.

import TurndownService from "turndown";

export type TextNormalizer = (markup: string) => string;

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
  emDelimiter: "*",
});

turndown.remove(["script", "style", "head", "title", "meta", "noscript"]);

export const markdownNormalizer: TextNormalizer = (markup) => turndown.turndown(markup).trim();

const NAMED_ENTITIES: Array<[string, string]> = [
  ["&nbsp;", " "],
  ["&lt;", "<"],
  ["&gt;", ">"],
  ["&quot;", '"'],
  ["&#39;", "'"],
  ["&apos;", "'"],
  ["&copy;", "©"],
  ["&reg;", "®"],
  ["&trade;", "™"],
  ["&hellip;", "..."],
  ["&mdash;", "—"],
  ["&ndash;", "–"],
  ["&ldquo;", "“"],
  ["&rdquo;", "”"],
  ["&lsquo;", "‘"],
  ["&rsquo;", "’"],
  // last, so "&amp;lt;" stays "&lt;"
  ["&amp;", "&"],
];

/** Regex tag stripper used when the normalizer throws. */
export function stripTags(html: string): string {
  let text = html
    .replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, "");

  text = text
    .replace(/<h([1-6])\b[^>]*>([\s\S]*?)<\/h\1>/gi, (_m, level: string, inner: string) => `\n${"#".repeat(Number(level))} ${inner}\n`)
    .replace(/<li\b[^>]*>([\s\S]*?)<\/li>/gi, "\n- $1\n")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/?(?:p|div|ul|ol|table|blockquote)\b[^>]*>/gi, "\n")
    .replace(/<\/tr>/gi, "\n")
    .replace(/<\/t[dh]>/gi, " | ")
    .replace(/<[^>]+>/g, "");

  for (const [entity, replacement] of NAMED_ENTITIES) {
    text = text.split(entity).join(replacement);
  }

  return text
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function countNonWhitespace(text: string): number {
  return text.replace(/\s+/g, "").length;
}

/** Below this many non-whitespace characters a converted rich body counts as empty. */
export const MIN_CONVERTED_BODY_CHARS = 10;

/**
 * Pick the body text for a message. A rich part wins when its conversion is
 * substantial; otherwise the plain part is used.
 */
export function selectBodyText(
  plain: string,
  html: string | undefined,
  normalizer: TextNormalizer = markdownNormalizer
): string {
  if (!html) return plain;
  let converted: string;
  try {
    converted = normalizer(html);
  } catch {
    converted = stripTags(html);
  }
  if (countNonWhitespace(converted) < MIN_CONVERTED_BODY_CHARS && plain.trim()) {
    return plain;
  }
  return converted;
}
