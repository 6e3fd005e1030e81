/**
 * HTML and XML text extraction
 */

import { JSDOM } from "jsdom";
import { SourceError, toError } from "../core/errors.js";

const NON_CONTENT = ["script", "style", "noscript", "template", "svg", "iframe"];

// Block elements whose boundaries must not glue words together
const BLOCKS = "br, p, div, li, h1, h2, h3, h4, h5, h6, tr, section, article";

function parseHtml(html: string): Document {
  return new JSDOM(html).window.document;
}

/**
 * Visible text of a page, whitespace collapsed
 */
export function htmlToText(html: string): string {
  const doc = parseHtml(html);

  for (const tag of NON_CONTENT) {
    doc.querySelectorAll(tag).forEach((el) => el.remove());
  }
  doc.querySelectorAll(BLOCKS).forEach((el) => el.after(" "));

  return (doc.body.textContent ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Raw contents of every JSON-LD block on the page
 */
export function extractJsonLd(html: string): string[] {
  const doc = parseHtml(html);
  return Array.from(doc.querySelectorAll('script[type="application/ld+json"]'))
    .map((el) => (el.textContent ?? "").trim())
    .filter((block) => block.length > 0);
}

/**
 * Parse an XML API response; malformed documents surface as SourceError
 */
export function parseXml(xml: string, source: string): Document {
  try {
    return new JSDOM(xml, { contentType: "text/xml" }).window.document;
  } catch (error) {
    throw new SourceError("Malformed XML response", source, { cause: toError(error) });
  }
}
