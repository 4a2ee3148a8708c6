import type { ToolDefinition, WebResult } from "@docsage/types";
import { parseQueryInput } from "./tool-input.js";

export const WEB_TOOL_NAME = "search_web";

export const WEB_TOOL_DESCRIPTION =
  "Search the internet for current, up-to-date information. " +
  "Use this when the question asks about recent events, news, " +
  "latest developments, or information not in personal documents. " +
  "Input should be a search query.";

export const WEB_RESULTS_HEADER = "Web Search Results:";

const DEFAULT_MAX_RESULTS = 3;

export interface IWebSearchBackend {
  search(query: string, maxResults: number): Promise<WebResult[]>;
}

const RETRIEVAL_RESULTS: WebResult[] = [
  {
    title: "Recent Advances in RAG Systems - AI Research Blog",
    content:
      "Recent improvements in RAG include hybrid search (combining dense and sparse " +
      "retrieval), re-ranking strategies, and better chunking methods.",
    url: "https://airesearch.example.com/rag-advances",
  },
  {
    title: "RAG vs Fine-tuning: When to Use Which - ML Journal",
    content:
      "RAG is preferred when you need up-to-date information, source attribution, or " +
      "domain-specific knowledge without retraining. Fine-tuning suits style and tone.",
    url: "https://mljournal.example.com/rag-vs-finetuning",
  },
  {
    title: "Production RAG at Scale - Tech Conference",
    content:
      "Panel discussion on scaling retrieval to millions of documents: flat indexes, " +
      "prompt caching and hybrid search.",
    url: "https://techconf.example.com/rag-production",
  },
];

const NEWS_RESULTS: WebResult[] = [
  {
    title: "Latest AI Developments This Week",
    content: "Model providers shipped reasoning improvements and longer context windows.",
    url: "https://ainews.example.com/weekly-update",
  },
  {
    title: "AI Regulation Updates",
    content: "EU AI Act implementation begins; other regions are drafting safety guidelines.",
    url: "https://airegulation.example.com/updates",
  },
];

/**
 * Canned results keyed on words in the query. No network, no cost; used when
 * no real backend is configured.
 */
export class SimulatedWebSearch implements IWebSearchBackend {
  async search(query: string, maxResults: number): Promise<WebResult[]> {
    const q = query.toLowerCase();

    let results: WebResult[];
    if (/\b(rag|retrieval)\b/.test(q)) {
      results = RETRIEVAL_RESULTS;
    } else if (/\b(news|latest|recent)\b/.test(q)) {
      results = NEWS_RESULTS;
    } else {
      results = [
        {
          title: `Information about: ${query}`,
          content: `Current information from the web about ${query}. This is a simulated result.`,
          url: "https://example.com/search",
        },
        {
          title: `More on ${query}`,
          content: "Additional context and recent updates related to your query.",
          url: "https://example2.com/info",
        },
      ];
    }

    return results.slice(0, maxResults);
  }
}

export function formatWebResults(results: readonly WebResult[]): string {
  let formatted = `${WEB_RESULTS_HEADER}\n\n`;

  results.forEach((result, i) => {
    formatted += `[${String(i + 1)}] ${result.title}\n`;
    formatted += `    ${result.content}\n`;
    formatted += `    Source: ${result.url}\n\n`;
  });

  return formatted;
}

export interface WebToolOptions {
  backend?: IWebSearchBackend;
  maxResults?: number;
}

export function createWebSearchTool(options?: WebToolOptions): ToolDefinition {
  const backend = options?.backend ?? new SimulatedWebSearch();
  const maxResults = options?.maxResults ?? DEFAULT_MAX_RESULTS;

  return {
    name: WEB_TOOL_NAME,
    description: WEB_TOOL_DESCRIPTION,
    parameters: {
      query: { type: "string", description: "What to look up on the web" },
    },
    async invoke(input: unknown): Promise<string> {
      const query = parseQueryInput(WEB_TOOL_NAME, input);
      return formatWebResults(await backend.search(query, maxResults));
    },
  };
}
