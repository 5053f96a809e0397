/**
 * PublicationRecord: one research output as scraped from a portal page.
 * Identity is the canonical form of `publication_url`.
 */
export interface PublicationRecord {
    /** Landing page of the publication (identity key once canonicalized) */
    publication_url: string;

    title: string;

    /** Four-digit year as text, or empty when the page had none */
    year: string;

    /** Author display names in page order */
    authors: string[];

    /** Absolute URLs of the authors' profile pages */
    author_urls: string[];

    abstract: string;
}

/**
 * Indexed view of a publication. One per unique canonical URL.
 */
export interface Document extends PublicationRecord {
    /** Content-addressed id derived from the canonical URL */
    id: string;
}

/**
 * Field names persisted for a record, in file order.
 */
export const PUBLICATION_FIELDS = [
    'publication_url',
    'title',
    'year',
    'authors',
    'author_urls',
    'abstract',
] as const satisfies ReadonlyArray<keyof PublicationRecord>;

/**
 * An empty record for the given URL.
 */
export function emptyRecord(publicationUrl = ''): PublicationRecord {
    return {
        publication_url: publicationUrl,
        title: '',
        year: '',
        authors: [],
        author_urls: [],
        abstract: '',
    };
}
