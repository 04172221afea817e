import { summarizeUsage } from "../core/usage.js";

export async function printUsageReport(sessionDir: string) {
  const summary = await summarizeUsage(sessionDir);
  if (!summary.entries) {
    console.log(
      `No usage data recorded (${sessionDir}/usage.jsonl is empty or missing).`,
    );
    return;
  }

  console.log("Token usage summary:");
  console.log(`  Calls:         ${summary.entries}`);
  console.log(`  Input tokens:  ${summary.totalInput}`);
  console.log(`  Output tokens: ${summary.totalOutput}`);
  console.log(`  Total tokens:  ${summary.totalTokens}`);

  console.log("\nBy model:");
  for (const [model, stats] of Object.entries(summary.byModel)) {
    console.log(
      `  ${model}: calls=${stats.calls} input=${stats.input} output=${stats.output} total=${stats.total}`,
    );
  }

  console.log("\nBy stage:");
  for (const [stage, stats] of Object.entries(summary.byStage)) {
    console.log(
      `  ${stage}: calls=${stats.calls} input=${stats.input} output=${stats.output} total=${stats.total}`,
    );
  }
}
