import stopwordList from './stopwords.json';

/**
 * Standard English stopword list (179 words, NLTK's `english` set).
 * Entries with apostrophes never survive tokenization but are kept so the
 * set matches the published list.
 */
export const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);
