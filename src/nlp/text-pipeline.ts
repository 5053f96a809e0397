import { STOPWORDS } from './stopwords.js';
import { tokenize, normalizeTokens } from './tokenizer.js';
import { stem } from './stemmer.js';

/**
 * The one preprocessing path shared by indexing and querying.
 *
 * Built once and passed to both the index builder and the search path; a query
 * only matches postings produced with the same stemming flag.
 */
export class TextPipeline {
    readonly useStemming: boolean;
    private readonly stopwords: ReadonlySet<string>;

    constructor(options: { useStemming?: boolean; stopwords?: ReadonlySet<string> } = {}) {
        this.useStemming = options.useStemming ?? true;
        this.stopwords = options.stopwords ?? STOPWORDS;
    }

    /**
     * tokenize → drop stopwords and 1-char tokens → stem (when enabled).
     */
    preprocess(text: string): string[] {
        const terms = normalizeTokens(tokenize(text), this.stopwords);
        return this.useStemming ? terms.map(stem) : terms;
    }
}

const pipelines = {
    stemmed: new TextPipeline({ useStemming: true }),
    plain: new TextPipeline({ useStemming: false }),
};

/**
 * Shared pipeline instance for a stemming flag.
 */
export function getTextPipeline(useStemming = true): TextPipeline {
    return useStemming ? pipelines.stemmed : pipelines.plain;
}

/**
 * Full preprocessing: tokenize → normalize → optionally stem.
 */
export function preprocess(text: string, useStemming = true): string[] {
    return getTextPipeline(useStemming).preprocess(text);
}
