/**
 * Inline style pattern catalog: normalizes style declarations, groups them by
 * signature and classifies each group. One instance per analysis call.
 */

import { load, type CheerioAPI, type Cheerio } from "cheerio";
import type { Element } from "domhandler";
import {
  PATTERN_CATEGORIES,
  type MarkupScan,
  type PatternCategory,
  type PatternGroup,
  type StyleContext,
  type StyleOccurrence,
} from "./types.js";

const POSITIONING_PROPERTIES = [
  "position",
  "top",
  "left",
  "right",
  "bottom",
  "margin",
  "padding",
  "float",
  "clear",
  "transform",
  "z-index",
];

const IE_HACK_PROPERTIES = new Set(["filter", "-ms-filter", "zoom"]);

/** Elements the preview harness injects into rendered pages. */
const INJECTED_IDS = new Set(["globalHeader", "metricsPanel", "metricsContent", "styleToggle", "metricsToggle"]);
const INJECTED_CONTAINER_SELECTOR = "#globalHeader, #metricsPanel";

export interface StyleDeclaration {
  property: string;
  value: string;
}

export function parseDeclarations(styleText: string): StyleDeclaration[] {
  const out: StyleDeclaration[] = [];
  for (const part of styleText.split(";")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const colon = trimmed.indexOf(":");
    if (colon < 0) {
      out.push({ property: trimmed.toLowerCase(), value: "" });
      continue;
    }
    out.push({
      property: trimmed.slice(0, colon).trim().toLowerCase(),
      value: trimmed.slice(colon + 1).trim(),
    });
  }
  return out;
}

/**
 * Signature of a style attribute: every value replaced by a placeholder,
 * case-folded, whitespace removed. Declaration order is kept.
 *
 * "Color: Red; font-size: 12px" -> "color:value;font-size:value"
 */
export function normalizeStyle(styleText: string): string {
  return parseDeclarations(styleText)
    .map((d) => `${d.property.replace(/\s+/g, "")}:value`)
    .join(";");
}

/** Numbers, currency amounts, or text that starts with a sign. */
export function isDataDrivenContext(context: Pick<StyleContext, "text" | "isNumericContent">): boolean {
  const text = context.text.trim();
  return context.isNumericContent || text.startsWith("-") || text.startsWith("+");
}

/**
 * Substring match on the raw style, so `text-align: left` and `border-top`
 * count as layout too.
 */
export function isPositioningStyle(styleText: string): boolean {
  const lower = styleText.toLowerCase();
  return POSITIONING_PROPERTIES.some((p) => lower.includes(p));
}

/** filter:, zoom:, or a star/underscore-prefixed property. */
export function isIeHack(styleText: string): boolean {
  return parseDeclarations(styleText).some(
    (d) => IE_HACK_PROPERTIES.has(d.property) || /^[*_][a-z]/.test(d.property)
  );
}

export function classifyGroup(group: readonly StyleOccurrence[]): PatternCategory {
  const representative = group[0];
  if (!representative) return "unique";
  if (isDataDrivenContext(representative.context)) return "data_driven";
  if (isPositioningStyle(representative.rawStyle)) return "positioning";
  return group.length > 1 ? "repetitive" : "unique";
}

function isInjected($el: Cheerio<Element>): boolean {
  const id = $el.attr("id");
  if (id && INJECTED_IDS.has(id)) return true;
  return $el.parents(INJECTED_CONTAINER_SELECTOR).length > 0;
}

function contextOf($: CheerioAPI, el: Element): StyleContext {
  const text = $(el).text().trim();
  const parentTag = $(el).parent().get(0)?.tagName;
  return {
    tag: el.tagName,
    text,
    isNumericContent: /\d/.test(text),
    isInTableCell: parentTag === "td" || parentTag === "th",
    parentTag,
  };
}

/** Finds inline styles, <font> tags, <style> blocks and IE hacks in one markup document. */
export function scanMarkup(html: string, file: string): MarkupScan {
  const $ = load(html);
  const occurrences: StyleOccurrence[] = [];
  let ieHacks = 0;

  $("[style]").each((_, el) => {
    const $el = $(el);
    if (isInjected($el)) return;
    const rawStyle = ($el.attr("style") ?? "").trim();
    if (!rawStyle) return;
    if (isIeHack(rawStyle)) ieHacks++;
    occurrences.push({
      signature: normalizeStyle(rawStyle),
      rawStyle,
      file,
      context: contextOf($, el),
    });
  });

  const fontTags = $("font").filter((_, el) => !isInjected($(el))).length;
  const styleBlocks = $("style").filter((_, el) => !isInjected($(el))).length;

  return { occurrences, ieHacks, fontTags, styleBlocks };
}

export interface CatalogSummary {
  counts: Record<PatternCategory, number>;
  patterns: Record<PatternCategory, PatternGroup[]>;
}

export class PatternCatalog {
  private readonly groups = new Map<string, StyleOccurrence[]>();

  add(occurrence: StyleOccurrence): void {
    const group = this.groups.get(occurrence.signature);
    if (group) group.push(occurrence);
    else this.groups.set(occurrence.signature, [occurrence]);
  }

  addAll(occurrences: readonly StyleOccurrence[]): void {
    for (const o of occurrences) this.add(o);
  }

  /**
   * Category counts (sum of occurrences) and per-category pattern lists,
   * sorted by count descending; ties keep first-seen order.
   */
  summarize(): CatalogSummary {
    const counts: Record<PatternCategory, number> = { repetitive: 0, data_driven: 0, positioning: 0, unique: 0 };
    const patterns: Record<PatternCategory, PatternGroup[]> = {
      repetitive: [],
      data_driven: [],
      positioning: [],
      unique: [],
    };
    for (const [signature, group] of this.groups) {
      const category = classifyGroup(group);
      counts[category] += group.length;
      patterns[category].push({ signature, count: group.length, example: group[0]?.rawStyle ?? "" });
    }
    for (const category of PATTERN_CATEGORIES) {
      patterns[category].sort((a, b) => b.count - a.count);
    }
    return { counts, patterns };
  }
}
