export type { IVectorIndex } from "./vector-store.interface.js";
export { FlatL2Index } from "./flat-l2-index.js";
