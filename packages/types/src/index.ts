export type * from "./chunk.js";
export type * from "./config.js";
export type * from "./document.js";
export type * from "./embedding.js";
export type * from "./search.js";
export type * from "./tool.js";
export type * from "./usage.js";
