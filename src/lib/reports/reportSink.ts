/**
 * Report sinks receive the final ranking once per completed evaluation.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { getResultsDir } from "../config.js";
import type { RankedResult } from "../evaluation/types.js";
import { renderComparisonMarkdown } from "./comparison.js";

export interface ReportSink {
  publish(evaluationId: string, ranked: RankedResult[]): Promise<void>;
}

export const COMPARISON_REPORT_FILE = "comparison_report.md";

/** Writes <resultsDir>/<evaluationId>/comparison_report.md. */
export class FileReportSink implements ReportSink {
  private readonly resultsDir: string;

  constructor(resultsDir?: string) {
    this.resultsDir = resultsDir ?? getResultsDir();
  }

  reportPath(evaluationId: string): string {
    return join(this.resultsDir, evaluationId, COMPARISON_REPORT_FILE);
  }

  async publish(evaluationId: string, ranked: RankedResult[]): Promise<void> {
    const path = this.reportPath(evaluationId);
    await mkdir(join(this.resultsDir, evaluationId), { recursive: true });
    await writeFile(path, renderComparisonMarkdown(evaluationId, ranked), "utf-8");
    console.log(`[ReportSink] Comparison report written to ${path}`);
  }
}
