import type { PublicationRecord } from './publication.js';

/**
 * What the extraction step found on one fetched page.
 */
export interface PageExtraction {
    /** Every outbound link on the page, absolute */
    links: string[];

    /** Links that a list page points at as publications, absolute */
    publicationLinks: string[];

    /** The publication described by this page, when it is a publication page */
    publication: PublicationRecord | null;
}

/**
 * Interface for page extractors.
 * The crawler hands every successfully fetched page to one of these and never
 * looks at the HTML itself.
 */
export interface PageExtractor {
    /** Human-readable extractor name */
    readonly name: string;

    /**
     * Extract links and, where the page is a publication page, its record.
     * @param url - The URL the HTML was fetched from (base for relative links)
     * @param html - Raw response body
     */
    extract(url: string, html: string): PageExtraction;
}
