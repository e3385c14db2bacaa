import type { Term } from "../types.js";
import type { CorpusIndex, CorpusStats, IndexedDocument } from "../corpusIndex.js";

/**
 * Simple in-memory document-frequency index.
 *
 * Data structure:
 * - term -> number of documents containing it
 * - documents kept in insertion order
 */
export class MemoryCorpusIndex implements CorpusIndex {
  private readonly docFreq = new Map<Term, number>();
  private readonly docs: IndexedDocument[] = [];

  addDocument(termCounts: Map<Term, number>, length: number): IndexedDocument {
    const doc: IndexedDocument = { docIndex: this.docs.length, length, termCounts };
    this.docs.push(doc);

    for (const [term, count] of termCounts) {
      if (count > 0) this.docFreq.set(term, (this.docFreq.get(term) ?? 0) + 1);
    }
    return doc;
  }

  documentFrequency(term: Term): number {
    return this.docFreq.get(term) ?? 0;
  }

  documents(): Iterable<IndexedDocument> {
    return this.docs;
  }

  getStats(): CorpusStats {
    return { docCount: this.docs.length };
  }
}
