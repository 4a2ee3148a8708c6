export type DocumentFormat = "text" | "pdf";

export interface LoadedDocument {
  path: string;
  /** Base name of the file; the only document attribute that survives chunking. */
  sourceName: string;
  format: DocumentFormat;
  text: string;
  pageCount: number;
}

export type LoadErrorPolicy = "abort" | "skip";

export interface LoadOptions {
  onError?: LoadErrorPolicy;
}

export interface LoadedSource {
  sourceName: string;
  chunkCount: number;
}

export interface LoadFailure {
  path: string;
  code: string;
  message: string;
}

export interface LoadReport {
  documents: LoadedSource[];
  failures: LoadFailure[];
  chunkCount: number;
}
