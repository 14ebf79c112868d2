/**
 * generate-summary.ts
 *
 * Aggregates every JSON analysis under a collection folder and writes the
 * strategic summary into the collection's README.md.
 *
 * Usage:
 *   npx tsx scripts/generate-summary.ts --base ./collection [--save-snapshot]
 */

import "dotenv/config";
import path from "path";
import { createClaudeModel, UsageTracker } from "../src/lib/claude.js";
import { loadConfig, requireApiKey } from "../src/lib/config.js";
import { ConfigurationError } from "../src/lib/errors.js";
import { runSummaryStage } from "../src/lib/summary.js";
import { fmtUsd, isDirectory } from "../src/lib/utils.js";

function parseArgs(): { base: string; readme?: string; saveSnapshot: boolean } {
  const args = process.argv.slice(2);
  let base = ".";
  let readme: string | undefined;
  let saveSnapshot = false;

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--base":
        base = args[++i] ?? base;
        break;
      case "--readme":
        readme = args[++i];
        break;
      case "--save-snapshot":
        saveSnapshot = true;
        break;
      case "--help":
        console.log(`Usage:
  npx tsx scripts/generate-summary.ts [--base <dir>] [--readme <file>] [--save-snapshot]

  --base <dir>      Collection folder to aggregate (default: .)
  --readme <file>   README to update (default: <base>/README.md)
  --save-snapshot   Also write the snapshot to <base>/pipeline/aggregated_snapshot.json

Requires ANTHROPIC_API_KEY. If the summary request fails, the README gets a
plain status report instead.`);
        process.exit(0);
      default:
        console.error(`Error: unknown argument "${args[i]}". Run with --help for usage.`);
        process.exit(1);
    }
  }
  return { base, readme, saveSnapshot };
}

async function main() {
  const args = parseArgs();
  if (!isDirectory(args.base)) {
    console.error(`Error: base directory not found: ${args.base}`);
    process.exit(1);
  }

  const config = loadConfig();
  requireApiKey(config);
  const tracker = new UsageTracker();
  const model = createClaudeModel(config, { tracker });

  console.log(`\n[Summary] ${path.resolve(args.base)}`);
  const result = await runSummaryStage({
    baseDir: args.base,
    model,
    readmePath: args.readme,
    saveSnapshot: args.saveSnapshot,
  });

  if (!result.readmeUpdated) {
    console.log("\n--- Summary ---\n");
    console.log(result.summary);
  }
  console.log(`\n  Documents: ${result.snapshot.totalDocuments}  Est. cost: ${fmtUsd(tracker.costUsd)}`);
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("\nFatal error:", err);
  }
  process.exit(1);
});
