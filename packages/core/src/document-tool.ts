import type { ToolDefinition } from "@docsage/types";
import type { DocumentRetrievalService } from "./retrieval-service.js";
import { parseQueryInput } from "./tool-input.js";

export const DOCUMENT_TOOL_NAME = "search_documents";

export const DOCUMENT_TOOL_DESCRIPTION =
  "Search through your personal documents and notes. " +
  "Use this when the question is about YOUR information, " +
  "past notes, saved documents, or personal knowledge. " +
  "Input should be a search query.";

export interface DocumentToolOptions {
  topK?: number;
}

export function createDocumentTool(
  service: Pick<DocumentRetrievalService, "search">,
  options?: DocumentToolOptions,
): ToolDefinition {
  return {
    name: DOCUMENT_TOOL_NAME,
    description: DOCUMENT_TOOL_DESCRIPTION,
    parameters: {
      query: { type: "string", description: "What to look for in the documents" },
    },
    async invoke(input: unknown): Promise<string> {
      const query = parseQueryInput(DOCUMENT_TOOL_NAME, input);
      return service.search(query, options?.topK);
    },
  };
}
