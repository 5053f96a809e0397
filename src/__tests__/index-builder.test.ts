import { describe, it, expect } from 'vitest';
import {
    stableId,
    buildDocuments,
    buildInvertedIndex,
    computeIdf,
    buildIndex,
    documentText,
    averageDocLength,
} from '../indexer/index-builder.js';
import { serializeIndex } from '../storage/index-store.js';
import { canonicalize } from '../storage/canonicalize.js';
import { getTextPipeline } from '../nlp/text-pipeline.js';
import { emptyRecord, type PublicationRecord } from '../types/index.js';

function record(slug: string, fields: Partial<PublicationRecord> = {}): PublicationRecord {
    return { ...emptyRecord(`https://portal.example.org/en/publications/${slug}`), ...fields };
}

const corpus: PublicationRecord[] = [
    record('neural', {
        title: 'Neural Networks',
        abstract: 'Training deep networks',
        authors: ['Ada Lovelace'],
        year: '2021',
    }),
    record('market', { title: 'Stock Market Analysis', year: '2019' }),
    record('graphs', { title: 'Graph Networks for Traffic', abstract: 'Forecasting with graphs' }),
];

describe('stableId', () => {
    it('should be 16 hex chars and stable for the canonical URL', () => {
        const id = stableId('https://portal.example.org/en/publications/neural');
        expect(id).toMatch(/^[0-9a-f]{16}$/);
        expect(stableId('https://portal.example.org/en/publications/neural')).toBe(id);
        expect(stableId('https://portal.example.org/en/publications/market')).not.toBe(id);
    });
});

describe('buildDocuments', () => {
    it('should key documents by the id of the canonical URL', () => {
        const docs = buildDocuments([record('neural/', { title: 'A' })]);
        const id = stableId(canonicalize('https://portal.example.org/en/publications/neural'));

        expect([...docs.keys()]).toEqual([id]);
        expect(docs.get(id)?.publication_url).toBe('https://portal.example.org/en/publications/neural/');
    });

    it('should let the later record win for a repeated URL', () => {
        const docs = buildDocuments([record('neural', { title: 'First' }), record('neural/', { title: 'Second' })]);
        expect(docs.size).toBe(1);
        expect([...docs.values()][0]?.title).toBe('Second');
    });

    it('should skip records without a URL', () => {
        expect(buildDocuments([{ ...emptyRecord(), title: 'Orphan' }]).size).toBe(0);
    });
});

describe('buildInvertedIndex', () => {
    it('should count terms of title, abstract, authors and year with one pipeline', () => {
        const docs = buildDocuments([corpus[0] ?? record('x')]);
        const [id] = [...docs.keys()];
        const { index, docLengths } = buildInvertedIndex(docs, getTextPipeline(true));

        // neural network ada lovelac 2021 train deep network
        expect(docLengths.get(id ?? '')).toBe(8);
        expect(index.get('network')?.get(id ?? '')).toBe(2);
        expect(index.get('train')?.get(id ?? '')).toBe(1);
        expect(index.get('2021')?.get(id ?? '')).toBe(1);
    });

    it('should match document text field order', () => {
        const doc = { id: 'x', ...record('x', { title: 'T', abstract: 'A', authors: ['P', 'Q'], year: '2000' }) };
        expect(documentText(doc)).toBe('T A P Q 2000');
    });

    it('should never store zero frequencies', () => {
        const snapshot = buildIndex(corpus);
        for (const postings of snapshot.index.values()) {
            for (const [docId, tf] of postings) {
                expect(tf).toBeGreaterThanOrEqual(1);
                expect(snapshot.docs.has(docId)).toBe(true);
            }
        }
    });

    it('should give empty text a zero length and no postings', () => {
        const snapshot = buildIndex([record('empty')]);
        expect([...snapshot.docLengths.values()]).toEqual([0]);
        expect(snapshot.index.size).toBe(0);
    });
});

describe('computeIdf', () => {
    it('should use ln(1 + (N - df + 0.5) / (df + 0.5))', () => {
        const index = new Map([
            ['rare', new Map([['d1', 1]])],
            ['common', new Map([['d1', 1], ['d2', 3]])],
        ]);
        const idf = computeIdf(index, 2);

        expect(idf.get('rare')).toBeCloseTo(Math.log(2), 10);
        expect(idf.get('common')).toBeCloseTo(Math.log(1 + 0.5 / 2.5), 10);
    });
});

describe('buildIndex', () => {
    it('should be byte-identical regardless of input order', () => {
        const forward = serializeIndex(buildIndex(corpus));
        const backward = serializeIndex(buildIndex([...corpus].reverse()));
        expect(backward).toBe(forward);
    });

    it('should recompute IDF over the whole corpus on rebuild', () => {
        const small = buildIndex(corpus.slice(0, 2));
        const large = buildIndex(corpus);

        expect(small.idf.get('neural')).toBeCloseTo(Math.log(2), 10);
        expect(large.idf.get('neural')).toBeCloseTo(Math.log(1 + 2.5 / 1.5), 10);
        // "network" appears in two of three documents after the rebuild
        expect(large.idf.get('network')).toBeCloseTo(Math.log(1 + 1.5 / 2.5), 10);
    });

    it('should produce terms of the chosen stemming mode', () => {
        expect(buildIndex(corpus, getTextPipeline(false)).index.has('networks')).toBe(true);
        expect(buildIndex(corpus, getTextPipeline(true)).index.has('networks')).toBe(false);
    });
});

describe('averageDocLength', () => {
    it('should average lengths and return 0 when empty', () => {
        expect(averageDocLength(new Map())).toBe(0);
        expect(averageDocLength(new Map([['a', 2], ['b', 5]]))).toBe(3.5);
    });
});
