#!/usr/bin/env node
/**
 * Score agents from the command line and print the ranking.
 *
 * Usage:
 *   tsx scripts/runEvaluation.ts <taskId> <agent...>       create and score a new evaluation
 *   tsx scripts/runEvaluation.ts --evaluation <id>         score the pending agents of an existing one
 */

import { closeDb } from "../src/lib/db/index.js";
import { errorMessage } from "../src/lib/errors.js";
import { makeEvaluationRuntime } from "../src/lib/evaluation/index.js";
import { rankResults, renderComparisonMarkdown } from "../src/lib/reports/comparison.js";

function usage(): never {
  console.error("Usage: runEvaluation.ts <taskId> <agent...> | --evaluation <id>");
  process.exit(2);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0) usage();

  const { orchestrator, store } = makeEvaluationRuntime();

  let evaluationId: string;
  if (args[0] === "--evaluation") {
    const id = args[1];
    if (!id) usage();
    evaluationId = id;
  } else {
    const [taskId, ...agents] = args;
    if (!taskId || agents.length === 0) usage();
    const created = await orchestrator.createEvaluation({ taskId, agents, createdBy: "cli" });
    evaluationId = created.id;
    console.log(`Created ${evaluationId} (${agents.join(", ")})`);
  }

  const evaluation = await store.getEvaluation(evaluationId);
  if (!evaluation) throw new Error(`Evaluation ${evaluationId} not found`);

  for (const agent of evaluation.agents) {
    if (evaluation.agentStatus[agent] === "completed") {
      console.log(`  ${agent}: already completed, skipping`);
      continue;
    }
    try {
      const { result, completed } = await orchestrator.evaluate(evaluationId, agent);
      console.log(`  ${agent}: ${result.score}/100${result.error ? ` (error: ${result.error})` : ""}`);
      if (completed) console.log(`Evaluation ${evaluationId} completed.`);
    } catch (err) {
      console.error(`  ${agent}: failed - ${errorMessage(err)}`);
      await orchestrator.recordAgentFailure(evaluationId, agent, errorMessage(err));
    }
  }
  await orchestrator.flushReports();

  const results = await store.listAgentResults({ evaluationId });
  console.log("");
  console.log(renderComparisonMarkdown(evaluationId, rankResults(evaluation.agents, results)));
}

main()
  .catch((err) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  })
  .finally(() => closeDb());
