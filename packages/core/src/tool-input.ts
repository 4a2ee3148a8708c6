import { z } from "zod";
import { ValidationError } from "@docsage/errors";

const queryText = z.string().trim().min(1, "query must not be empty");

// Orchestrators pass either the bare query or a `{ query }` arguments object.
const toolInputSchema = z.union([queryText, z.object({ query: queryText })]);

export function parseQueryInput(toolName: string, input: unknown): string {
  const parsed = toolInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${toolName} input`,
      Object.fromEntries(
        parsed.error.issues.map((issue) => [issue.path.join(".") || "query", issue.message]),
      ),
    );
  }
  return typeof parsed.data === "string" ? parsed.data : parsed.data.query;
}
