/**
 * Scoring types shared by the structural, judge and hybrid strategies.
 */

import type { EvaluationType } from "../evaluation/types.js";

/** Relative path -> file text. */
export type FileSet = Record<string, string>;

export type PatternCategory = "repetitive" | "data_driven" | "positioning" | "unique";

export const PATTERN_CATEGORIES: readonly PatternCategory[] = [
  "repetitive",
  "data_driven",
  "positioning",
  "unique",
];

export interface StyleContext {
  tag: string;
  text: string;
  isNumericContent: boolean;
  isInTableCell: boolean;
  parentTag?: string;
}

/** One inline style attribute seen during a single analysis call. */
export interface StyleOccurrence {
  signature: string;
  rawStyle: string;
  file: string;
  context: StyleContext;
}

export interface PatternGroup {
  signature: string;
  count: number;
  example: string;
}

export interface MarkupScan {
  occurrences: StyleOccurrence[];
  ieHacks: number;
  fontTags: number;
  styleBlocks: number;
}

export interface FileAnalysis {
  totalInlineStyles: number;
  ieHacks: number;
  fontTags: number;
  styleBlocks: number;
}

export interface FileSetAnalysis {
  totalInlineStyles: number;
  repetitive: number;
  dataDriven: number;
  positioning: number;
  unique: number;
  ieHacks: number;
  fontTags: number;
  styleBlocks: number;
  files: Record<string, FileAnalysis>;
  patterns: Record<PatternCategory, PatternGroup[]>;
}

export type StructuralBreakdown = {
  pattern_consolidation: number;
  ie_hack_removal: number;
  font_tag_modernization: number;
  style_block_cleanup: number;
  smart_retention: number;
};

export interface StructuralScore {
  kind: "rule_based";
  totalScore: number;
  breakdown: StructuralBreakdown;
  baseline: FileSetAnalysis;
  solution: FileSetAnalysis;
  improvements: string[];
}

export interface JudgeScore {
  kind: "ai_judge";
  totalScore: number;
  breakdown: Record<string, number>;
  feedback: string;
  strengths: string[];
  improvements: string[];
  model: string;
  /** Set when the judge call or its reply failed; totalScore is then 0. */
  error?: string;
}

/** Common shape every strategy returns; becomes an AgentResult. */
export interface ScoreResult {
  kind: EvaluationType;
  totalScore: number;
  breakdown: Record<string, number>;
  feedback: string;
  strengths: string[];
  improvements: string[];
  error?: string;
  details: {
    structural?: StructuralScore;
    judge?: JudgeScore;
  };
}
