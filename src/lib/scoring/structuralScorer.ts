/**
 * Rule-based style consolidation scorer.
 *
 * Compares baseline and solution markup: how many repetitive inline styles were
 * consolidated, whether legacy constructs were removed, and whether the styles
 * that remain inline are the ones that should.
 */

import { PatternCatalog, scanMarkup } from "./patternCatalog.js";
import type { FileAnalysis, FileSet, FileSetAnalysis, StructuralBreakdown, StructuralScore } from "./types.js";

export const STRUCTURAL_WEIGHTS: StructuralBreakdown = {
  pattern_consolidation: 40,
  ie_hack_removal: 20,
  font_tag_modernization: 15,
  style_block_cleanup: 15,
  smart_retention: 10,
};

const MARKUP_EXTENSIONS = [".html", ".htm"];

function isMarkupFile(path: string): boolean {
  const lower = path.toLowerCase();
  return MARKUP_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export function analyzeFileSet(files: FileSet): FileSetAnalysis {
  const catalog = new PatternCatalog();
  const perFile: Record<string, FileAnalysis> = {};
  let totalInlineStyles = 0;
  let ieHacks = 0;
  let fontTags = 0;
  let styleBlocks = 0;

  for (const [path, content] of Object.entries(files)) {
    if (!isMarkupFile(path)) continue;
    const scan = scanMarkup(content, path);
    catalog.addAll(scan.occurrences);
    perFile[path] = {
      totalInlineStyles: scan.occurrences.length,
      ieHacks: scan.ieHacks,
      fontTags: scan.fontTags,
      styleBlocks: scan.styleBlocks,
    };
    totalInlineStyles += scan.occurrences.length;
    ieHacks += scan.ieHacks;
    fontTags += scan.fontTags;
    styleBlocks += scan.styleBlocks;
  }

  const { counts, patterns } = catalog.summarize();
  return {
    totalInlineStyles,
    repetitive: counts.repetitive,
    dataDriven: counts.data_driven,
    positioning: counts.positioning,
    unique: counts.unique,
    ieHacks,
    fontTags,
    styleBlocks,
    files: perFile,
    patterns,
  };
}

/** Full weight when the solution has none left, or the baseline had none to remove. */
function removalScore(inBaseline: number, remaining: number, weight: number): number {
  return inBaseline === 0 || remaining === 0 ? weight : 0;
}

export function computeBreakdown(baseline: FileSetAnalysis, solution: FileSetAnalysis): StructuralBreakdown {
  let patternConsolidation = STRUCTURAL_WEIGHTS.pattern_consolidation;
  if (baseline.repetitive > 0) {
    const rate = Math.max(0, (baseline.repetitive - solution.repetitive) / baseline.repetitive);
    patternConsolidation = Math.round(rate * STRUCTURAL_WEIGHTS.pattern_consolidation);
  }

  let smartRetention = STRUCTURAL_WEIGHTS.smart_retention;
  if (solution.totalInlineStyles > 0) {
    const legitimate = solution.dataDriven + solution.positioning;
    smartRetention = Math.round((legitimate / solution.totalInlineStyles) * STRUCTURAL_WEIGHTS.smart_retention);
  }

  return {
    pattern_consolidation: patternConsolidation,
    ie_hack_removal: removalScore(baseline.ieHacks, solution.ieHacks, STRUCTURAL_WEIGHTS.ie_hack_removal),
    font_tag_modernization: removalScore(baseline.fontTags, solution.fontTags, STRUCTURAL_WEIGHTS.font_tag_modernization),
    style_block_cleanup: removalScore(baseline.styleBlocks, solution.styleBlocks, STRUCTURAL_WEIGHTS.style_block_cleanup),
    smart_retention: smartRetention,
  };
}

export function suggestImprovements(baseline: FileSetAnalysis, solution: FileSetAnalysis): string[] {
  const out: string[] = [];
  if (solution.repetitive > baseline.repetitive * 0.2) {
    out.push(`Consider consolidating ${solution.repetitive} remaining repetitive styles`);
  }
  if (solution.ieHacks > 0) {
    out.push(`Remove ${solution.ieHacks} remaining IE-specific hacks`);
  }
  if (solution.fontTags > 0) {
    out.push(`Modernize ${solution.fontTags} remaining <font> tags`);
  }
  if (solution.styleBlocks > 0) {
    out.push(`Move ${solution.styleBlocks} <style> blocks to external CSS`);
  }
  if (solution.repetitive < baseline.repetitive * 0.8) {
    out.push("Good job consolidating repetitive patterns!");
  }
  if (solution.dataDriven >= baseline.dataDriven * 0.8) {
    out.push("Excellent retention of data-driven styles!");
  }
  return out;
}

/** Pure function of its inputs; safe to call concurrently. */
export function scoreStructure(baselineFiles: FileSet, solutionFiles: FileSet): StructuralScore {
  const baseline = analyzeFileSet(baselineFiles);
  const solution = analyzeFileSet(solutionFiles);
  const breakdown = computeBreakdown(baseline, solution);
  const sum =
    breakdown.pattern_consolidation +
    breakdown.ie_hack_removal +
    breakdown.font_tag_modernization +
    breakdown.style_block_cleanup +
    breakdown.smart_retention;
  return {
    kind: "rule_based",
    totalScore: Math.max(0, Math.min(100, sum)),
    breakdown,
    baseline,
    solution,
    improvements: suggestImprovements(baseline, solution),
  };
}
