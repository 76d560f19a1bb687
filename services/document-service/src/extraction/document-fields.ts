export const NOT_AVAILABLE = 'N/A' as const;

export const DOCUMENT_CATEGORIES = [
  'Prescription',
  'Lab Report',
  'Medical Bill',
  'Pharmacy Bill',
  'Discharge Summary',
  'Consultation Notes',
  'Other',
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

/** Category given to input with no readable text. Never returned by the model. */
export const EMPTY_DOCUMENT_CATEGORY = 'Empty Document';

/** `N/A` only when the model omitted the category altogether. */
export type StoredCategory = DocumentCategory | typeof EMPTY_DOCUMENT_CATEGORY | typeof NOT_AVAILABLE;

/**
 * The structured record the language model is asked to produce. Keys are
 * snake_case because they are both the prompt contract and the HTTP contract.
 * Absent values hold the `N/A` sentinel rather than null.
 */
export interface ExtractedFields {
  category: StoredCategory;
  /** `YYYY-MM-DD` or `N/A`. */
  document_date: string;
  doctor_name: string;
  hospital_name: string;
  summary: string;
}

export const REQUIRED_FIELD_KEYS: ReadonlyArray<keyof ExtractedFields> = [
  'category',
  'document_date',
  'doctor_name',
  'hospital_name',
  'summary',
];

export const EMPTY_DOCUMENT_FIELDS: Readonly<ExtractedFields> = Object.freeze({
  category: EMPTY_DOCUMENT_CATEGORY,
  document_date: NOT_AVAILABLE,
  doctor_name: NOT_AVAILABLE,
  hospital_name: NOT_AVAILABLE,
  summary: 'Document appears to be empty or text could not be extracted.',
});

export const FALLBACK_FIELDS: Readonly<ExtractedFields> = Object.freeze({
  category: 'Other',
  document_date: NOT_AVAILABLE,
  doctor_name: NOT_AVAILABLE,
  hospital_name: NOT_AVAILABLE,
  summary: 'Medical document processed but specific information could not be extracted.',
});
