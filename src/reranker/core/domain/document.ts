/**
 * A candidate document as the host hands it over.
 *
 * Only `id` and the scorable text fields are known to the engine; every
 * other field is carried through snapshots untouched.
 */
export interface RankDocument {
  id: string | number;
  title?: string;
  summary?: string;
  tags?: string[];
  "extra-tags"?: string[];
  /** Score from the retrieval stage that produced the candidate list. */
  score?: number;
  /** Set by the engine once the document has been scored. */
  rerankScore?: number;
  [field: string]: unknown;
}

export interface RankRequest {
  requestId: number;
  queryText: string;
  candidateDocuments: readonly RankDocument[];
}

/**
 * Joins title, summary and both tag lists into the text the model scores.
 */
export function combineScorableText(document: RankDocument): string {
  const title = document.title || "";
  const summary = document.summary || "";
  const allTags = (document.tags || [])
    .concat(document["extra-tags"] || [])
    .join(" ");
  return `${title} ${summary} ${allTags}`.trim();
}
