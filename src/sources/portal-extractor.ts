import * as cheerio from 'cheerio';
import type { PageExtraction, PageExtractor, PublicationRecord } from '../types/index.js';

type Page = cheerio.CheerioAPI;

const YEAR_RE = /\b(?:19|20)\d{2}\b/;

/** Anchor text shorter than this is not taken as a publication title */
const MIN_TITLE_LENGTH = 4;

export interface PortalExtractorOptions {
    /** Path fragment of publication pages */
    publicationPattern?: string;
    /** Path fragment of person (author) pages */
    personPattern?: string;
}

/**
 * Extractor for research-portal pages (list pages, organisation pages,
 * publication pages), reading plain HTML plus citation/OpenGraph meta tags.
 */
export class PortalPageExtractor implements PageExtractor {
    readonly name = 'portal';
    private readonly publicationPattern: string;
    private readonly personPattern: string;

    constructor(options: PortalExtractorOptions = {}) {
        this.publicationPattern = options.publicationPattern ?? '/en/publications/';
        this.personPattern = options.personPattern ?? '/en/persons/';
    }

    extract(url: string, html: string): PageExtraction {
        const $ = cheerio.load(html);

        return {
            links: extractLinks($, url),
            publicationLinks: this.extractPublicationLinks($, url),
            publication: url.includes(this.publicationPattern) ? this.parsePublication($, url) : null,
        };
    }

    /**
     * Publication links listed on a page, with a usable title in the anchor
     * text, `title` or `aria-label`.
     */
    private extractPublicationLinks($: Page, baseUrl: string): string[] {
        const seen = new Set<string>();
        const out: string[] = [];

        $('a[href]').each((_, el) => {
            const a = $(el);
            const href = (a.attr('href') ?? '').trim();
            if (!href || !href.includes(this.publicationPattern)) return;

            const abs = absoluteUrl(baseUrl, href);
            if (!abs || !abs.includes(this.publicationPattern) || seen.has(abs)) return;

            const title = text(a) || (a.attr('title') ?? '').trim() || (a.attr('aria-label') ?? '').trim();
            if (title.length < MIN_TITLE_LENGTH) return;

            seen.add(abs);
            out.push(abs);
        });

        return out;
    }

    private parsePublication($: Page, url: string): PublicationRecord {
        const title =
            text($('h1').first()) ||
            meta($, 'citation_title') ||
            meta($, 'og:title') ||
            text($('title').first());

        const { authors, authorUrls } = this.parseAuthors($, url);

        return {
            publication_url: url,
            title,
            year: parseYear($),
            authors,
            author_urls: authorUrls,
            abstract: parseAbstract($),
        };
    }

    private parseAuthors($: Page, baseUrl: string): { authors: string[]; authorUrls: string[] } {
        const authors: string[] = [];
        const authorUrls: string[] = [];

        $('a[href]').each((_, el) => {
            const a = $(el);
            const href = (a.attr('href') ?? '').trim();
            if (!href.includes(this.personPattern)) return;

            const name = text(a);
            if (name && !authors.includes(name)) authors.push(name);

            const abs = absoluteUrl(baseUrl, href);
            if (abs && !authorUrls.includes(abs)) authorUrls.push(abs);
        });

        if (authors.length === 0) {
            $('meta[name="citation_author"]').each((_, el) => {
                const name = ($(el).attr('content') ?? '').trim();
                if (name && !authors.includes(name)) authors.push(name);
            });
        }

        return { authors, authorUrls };
    }
}

// ─── Page helpers ─────────────────────────────────────

/**
 * All `a[href]` targets resolved against the page URL; fragment-only links skipped.
 */
export function extractLinks($: Page, baseUrl: string): string[] {
    const urls: string[] = [];
    $('a[href]').each((_, el) => {
        const href = ($(el).attr('href') ?? '').trim();
        if (!href || href.startsWith('#')) return;
        const abs = absoluteUrl(baseUrl, href);
        if (abs) urls.push(abs);
    });
    return urls;
}

/**
 * Year from citation metadata, else the first plausible year in the page text.
 */
function parseYear($: Page): string {
    const metaDate = meta($, 'citation_publication_date') || meta($, 'citation_date');
    const fromMeta = YEAR_RE.exec(metaDate);
    if (fromMeta) return fromMeta[0];

    const fromText = YEAR_RE.exec(text($('body')));
    return fromText ? fromText[0] : '';
}

/**
 * Text of the first paragraph/div after an "Abstract" heading, else the
 * abstract or description meta tag.
 */
function parseAbstract($: Page): string {
    const heading = $('h2, h3, strong')
        .filter((_, el) => text($(el)).toLowerCase().includes('abstract'))
        .first();

    if (heading.length > 0) {
        const next = heading.nextAll('p, div').first();
        const target = next.length > 0 ? next : heading.parent().nextAll('p, div').first();
        const abstract = text(target);
        if (abstract) return abstract;
    }

    return meta($, 'citation_abstract') || meta($, 'description');
}

function meta($: Page, key: string): string {
    const tag = $(`meta[name="${key}"]`).first();
    const found = tag.length > 0 ? tag : $(`meta[property="${key}"]`).first();
    return (found.attr('content') ?? '').trim();
}

/**
 * Element text with whitespace runs collapsed.
 */
function text(el: { text(): string }): string {
    return el.text().replace(/\s+/g, ' ').trim();
}

function absoluteUrl(base: string, href: string): string | null {
    try {
        return new URL(href, base).toString();
    } catch {
        return null;
    }
}
