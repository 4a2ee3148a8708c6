import { ValidationError } from "@docsage/errors";

export interface SearchCommandOptions {
  files: string[];
  query: string;
  topK?: number;
  skipFailed: boolean;
}

/**
 * `search [-k N] [--skip-failed] --file <path>... -- <query>`
 *
 * Bare arguments before `--` are taken as files too; everything after it is
 * the query.
 */
export function parseSearchArgs(args: readonly string[]): SearchCommandOptions {
  const files: string[] = [];
  let topK: number | undefined;
  let skipFailed = false;
  let query: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case "--":
        query = args.slice(i + 1).join(" ").trim();
        i = args.length;
        break;
      case "-k":
      case "--top-k":
        topK = parsePositiveInt(args[i + 1], arg);
        i += 1;
        break;
      case "-f":
      case "--file": {
        const path = args[i + 1];
        if (path === undefined || path.startsWith("-")) {
          throw new ValidationError(`${arg} needs a path`, { file: "missing" });
        }
        files.push(path);
        i += 1;
        break;
      }
      case "--skip-failed":
        skipFailed = true;
        break;
      default:
        if (arg === undefined || arg.startsWith("-")) {
          throw new ValidationError(`Unknown option: ${String(arg)}`, { option: String(arg) });
        }
        files.push(arg);
    }
  }

  if (files.length === 0) {
    throw new ValidationError("At least one --file is required", { file: "missing" });
  }
  if (!query) {
    throw new ValidationError("A query is required after --", { query: "missing" });
  }

  return { files, query, topK, skipFailed };
}

export function parseRouteArgs(args: readonly string[]): string {
  const question = args.join(" ").trim();
  if (question.length === 0) {
    throw new ValidationError("A question is required", { question: "missing" });
  }
  return question;
}

function parsePositiveInt(value: string | undefined, flag: string): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${flag} needs a positive integer`, { [flag]: String(value) });
  }
  return parsed;
}
