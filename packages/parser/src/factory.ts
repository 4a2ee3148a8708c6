import { basename, extname } from "node:path";
import { UnsupportedFormatError } from "@docsage/errors";
import type { LoadedDocument } from "@docsage/types";
import type { ILoader } from "./loader.interface.js";
import { TextLoader } from "./text-loader.js";
import { PdfLoader } from "./pdf-loader.js";

const defaultLoaders: ILoader[] = [new TextLoader(), new PdfLoader()];

/**
 * Select the loader for a path by its (case-insensitive) extension.
 * Throws UnsupportedFormatError for anything else.
 */
export function getLoader(path: string, loaders: readonly ILoader[] = defaultLoaders): ILoader {
  const extension = extname(path).toLowerCase();
  const loader = loaders.find((l) => l.supportedExtensions.includes(extension));

  if (!loader) {
    throw new UnsupportedFormatError(path, extension);
  }

  return loader;
}

export interface SupportPartition {
  supported: string[];
  rejected: Array<{ path: string; error: UnsupportedFormatError }>;
}

/**
 * Sort a batch by whether any loader takes each path, before any file is
 * read. Order is kept on both sides.
 */
export function partitionSupported(
  paths: readonly string[],
  loaders?: readonly ILoader[],
): SupportPartition {
  const partition: SupportPartition = { supported: [], rejected: [] };

  for (const path of paths) {
    try {
      getLoader(path, loaders);
      partition.supported.push(path);
    } catch (error: unknown) {
      if (!(error instanceof UnsupportedFormatError)) throw error;
      partition.rejected.push({ path, error });
    }
  }

  return partition;
}

export async function loadFile(
  path: string,
  loaders?: readonly ILoader[],
): Promise<LoadedDocument> {
  const loader = getLoader(path, loaders);
  const { text, pageCount } = await loader.load(path);

  return {
    path,
    sourceName: basename(path),
    format: loader.format,
    text,
    pageCount,
  };
}
