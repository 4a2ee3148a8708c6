import { readFile } from "node:fs/promises";
import { DecodeError } from "@docsage/errors";
import type { ILoader, LoadedText } from "./loader.interface.js";

/**
 * Plain-text loader. Reads the whole file and decodes it as strict UTF-8.
 */
export class TextLoader implements ILoader {
  readonly format = "text";
  readonly supportedExtensions = [".txt"];

  async load(path: string): Promise<LoadedText> {
    const bytes = await readFile(path);
    return { text: decodeUtf8(bytes, path), pageCount: 1 };
  }
}

export function decodeUtf8(bytes: Uint8Array, path: string): string {
  // fatal: malformed sequences throw instead of becoming U+FFFD
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    return decoder.decode(bytes);
  } catch (error: unknown) {
    throw new DecodeError(path, "File is not valid UTF-8 text", { cause: error });
  }
}
