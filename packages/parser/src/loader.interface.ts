import type { DocumentFormat } from "@docsage/types";

export interface LoadedText {
  text: string;
  pageCount: number;
}

export interface ILoader {
  readonly format: DocumentFormat;
  /** Lower-cased extensions including the dot, e.g. ".txt". */
  readonly supportedExtensions: readonly string[];
  load(path: string): Promise<LoadedText>;
}
