// Entry interface shared by the extractors, the pipeline and the feed assembler
export interface Entry {
  title: string;             // Link caption, whitespace-collapsed, at least 10 characters
  url: string;               // Absolute article URL, unique within a run
  published_at: Date;        // Resolved UTC timestamp ("now" when the date could not be resolved)
  raw_date_text: string;     // Matched date snippet, or UNKNOWN_DATE_TEXT
  date_resolved: boolean;    // False when published_at fell back to "now"
  body?: string;             // Extracted article text, set by the body extraction stage
}

export const UNKNOWN_DATE_TEXT = 'Unknown';
