import type { DocumentRetrievalService } from "@docsage/core";
import type { SearchCommandOptions } from "../args.js";

export interface SearchCommandContext {
  service: Pick<DocumentRetrievalService, "loadDocuments" | "search">;
  defaultTopK: number;
}

export async function runSearch(
  options: SearchCommandOptions,
  context: SearchCommandContext,
): Promise<string> {
  await context.service.loadDocuments(options.files, {
    onError: options.skipFailed ? "skip" : "abort",
  });
  return context.service.search(options.query, options.topK ?? context.defaultTopK);
}
