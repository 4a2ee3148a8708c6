export { DocumentRetrievalService, NO_DOCUMENTS_MESSAGE } from "./retrieval-service.js";
export type { RetrievalServiceDependencies } from "./retrieval-service.js";

export { prepareDocument } from "./ingestion.js";
export type { IngestionDependencies, PreparedDocument } from "./ingestion.js";

export { formatSearchResults, excerpt, SEARCH_RESULTS_HEADER } from "./result-formatter.js";

export {
  createDocumentTool,
  DOCUMENT_TOOL_NAME,
  DOCUMENT_TOOL_DESCRIPTION,
} from "./document-tool.js";
export type { DocumentToolOptions } from "./document-tool.js";

export {
  createWebSearchTool,
  SimulatedWebSearch,
  formatWebResults,
  WEB_TOOL_NAME,
  WEB_TOOL_DESCRIPTION,
  WEB_RESULTS_HEADER,
} from "./web-tool.js";
export type { IWebSearchBackend, WebToolOptions } from "./web-tool.js";
