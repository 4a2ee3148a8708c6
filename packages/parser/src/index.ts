export type { ILoader, LoadedText } from "./loader.interface.js";
export { TextLoader, decodeUtf8 } from "./text-loader.js";
export { PdfLoader, openWithPdfjs } from "./pdf-loader.js";
export type { PdfPages, PdfOpener } from "./pdf-loader.js";
export { normalizeText } from "./normalize.js";
export { getLoader, partitionSupported, loadFile } from "./factory.js";
export type { SupportPartition } from "./factory.js";
