export interface VectorMatch {
  /** Slot of the matched vector in the index, equal to the chunk position. */
  position: number;
  /** Squared Euclidean distance to the query vector. */
  distance: number;
}

export interface SearchHit {
  rank: number;
  distance: number;
  sourceName: string;
  excerpt: string;
  position: number;
}

/** One result from a web search backend. */
export interface WebResult {
  title: string;
  content: string;
  url: string;
}
