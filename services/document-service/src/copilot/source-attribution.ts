import { SearchableDocument } from '../document-store';

export interface SearchSource {
  filename: string;
  summary: string;
  category: string;
}

/**
 * A document counts as a source when its filename appears anywhere in the
 * answer, ignoring case. Paraphrased names are missed and accidental
 * substrings are kept.
 */
export function attributeSources(answer: string, documents: SearchableDocument[]): SearchSource[] {
  const haystack = answer.toLowerCase();
  return documents
    .filter((doc) => doc.filename !== '' && haystack.includes(doc.filename.toLowerCase()))
    .map((doc) => ({ filename: doc.filename, summary: doc.summary, category: doc.category }));
}
