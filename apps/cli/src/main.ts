#!/usr/bin/env node
/**
 * docsage CLI: search personal documents from the terminal.
 */

import "dotenv/config";
import { ZodError } from "zod";
import { AppError } from "@docsage/errors";
import { parseRouteArgs, parseSearchArgs } from "./args.js";
import { createAppContext } from "./context.js";
import { runSearch } from "./commands/search.js";
import { runRoute } from "./commands/route.js";
import { runUsage } from "./commands/usage.js";

function printHelp(): void {
  console.log(`docsage - question answering over your own documents

Usage:
  docsage search [-k N] [--skip-failed] --file <path>... -- <query>
                                    Load .txt/.pdf files and print the closest passages
  docsage route <question>          Show which sources a question should use
  docsage usage                     Show recorded embedding usage and cost

Options:
  -k, --top-k N      Number of passages to return (default: SEARCH_TOP_K)
  -f, --file PATH    Document to load; repeat for more
  --skip-failed      Report and skip files that cannot be loaded
  -h, --help         Show this message

Examples:
  docsage search --file notes.txt --file paper.pdf -- chunk size
  docsage route "What are the latest advances in retrieval?"
`);
}

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);

  switch (command) {
    case undefined:
    case "-h":
    case "--help":
    case "help":
      printHelp();
      return;

    case "search": {
      const options = parseSearchArgs(rest);
      const { config, service } = createAppContext();
      console.log(await runSearch(options, { service, defaultTopK: config.search.topK }));
      return;
    }

    case "route":
      console.log(runRoute(parseRouteArgs(rest)));
      return;

    case "usage": {
      const { config, usageLog } = createAppContext();
      console.log(await runUsage({ usageLog, budgetUsd: config.usage.budgetUsd }));
      return;
    }

    default:
      console.error(`Unknown command "${command}".`);
      printHelp();
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (AppError.isAppError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else if (error instanceof ZodError) {
    console.error("Invalid configuration:");
    for (const issue of error.issues) {
      console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    }
  } else {
    console.error("Unexpected error:", error instanceof Error ? (error.stack ?? error.message) : error);
  }
  process.exitCode = 1;
});
