import { RankDocument } from "./document";

interface ScoredEntry {
  document: RankDocument;
  /** Position in the candidate list, used to keep ties in input order. */
  position: number;
  score: number;
}

/**
 * Live state of one ranking request.
 *
 * Candidates are split at the cutoff into an eligible head and a
 * pass-through tail. Eligible documents are taken one at a time; each ends
 * up either scored (kept sorted by descending score, ties in input order)
 * or failed (kept unscored, in processing order).
 */
export class RankingProgress {
  private readonly eligible: readonly RankDocument[];
  private readonly tail: readonly RankDocument[];
  private readonly scored: ScoredEntry[] = [];
  private readonly failed: RankDocument[] = [];
  private cursor = 0;

  constructor(candidates: readonly RankDocument[], cutoff: number) {
    const limit = Math.max(0, Math.floor(cutoff));
    this.eligible = candidates.slice(0, limit);
    this.tail = candidates.slice(limit);
  }

  get eligibleCount(): number {
    return this.eligible.length;
  }

  get candidateCount(): number {
    return this.eligible.length + this.tail.length;
  }

  get scoredCount(): number {
    return this.scored.length;
  }

  get failedCount(): number {
    return this.failed.length;
  }

  /**
   * Takes the next eligible document off the queue, or null when none remain.
   */
  next(): { document: RankDocument; position: number } | null {
    if (this.cursor >= this.eligible.length) return null;
    const position = this.cursor++;
    return { document: this.eligible[position], position };
  }

  recordScore(document: RankDocument, position: number, score: number): void {
    const entry: ScoredEntry = {
      document: { ...document, rerankScore: score },
      position,
      score,
    };
    // Insert after every entry scoring at least as high; a later position
    // never jumps ahead of an equal score.
    let index = this.scored.findIndex(
      (existing) =>
        existing.score < score ||
        (existing.score === score && existing.position > position),
    );
    if (index === -1) index = this.scored.length;
    this.scored.splice(index, 0, entry);
  }

  recordFailure(document: RankDocument): void {
    this.failed.push(document);
  }

  /**
   * scored ++ failed ++ still-queued eligible ++ pass-through tail.
   */
  snapshot(): RankDocument[] {
    return [
      ...this.scored.map((entry) => entry.document),
      ...this.failed,
      ...this.eligible.slice(this.cursor),
      ...this.tail,
    ];
  }
}
