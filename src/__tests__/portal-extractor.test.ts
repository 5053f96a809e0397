import { describe, it, expect } from 'vitest';
import { PortalPageExtractor } from '../sources/portal-extractor.js';

const BASE = 'https://portal.example.org';
const extractor = new PortalPageExtractor();

describe('PortalPageExtractor', () => {
    describe('links', () => {
        it('should resolve relative links and skip fragment-only ones', () => {
            const page = extractor.extract(
                `${BASE}/en/organisations/lab/`,
                `<a href="members">Members</a>
                 <a href="/en/persons/ada">Ada</a>
                 <a href="#content">Skip</a>
                 <a href="">Empty</a>
                 <a href="https://other.example.com/x">Elsewhere</a>`
            );

            expect(page.links).toEqual([
                `${BASE}/en/organisations/lab/members`,
                `${BASE}/en/persons/ada`,
                'https://other.example.com/x',
            ]);
            expect(page.publication).toBeNull();
        });

        it('should take publication links with a usable title', () => {
            const page = extractor.extract(
                `${BASE}/en/organisations/lab`,
                `<a href="/en/publications/one">Graph learning at scale</a>
                 <a href="/en/publications/one">Graph learning at scale (again)</a>
                 <a href="/en/publications/two">PDF</a>
                 <a href="/en/publications/three" title="Titled by attribute"><img src="x.png"></a>
                 <a href="/en/publications/four" aria-label="Labelled link"></a>
                 <a href="/en/persons/ada">Ada Lovelace</a>`
            );

            expect(page.publicationLinks).toEqual([
                `${BASE}/en/publications/one`,
                `${BASE}/en/publications/three`,
                `${BASE}/en/publications/four`,
            ]);
        });
    });

    describe('publication pages', () => {
        const url = `${BASE}/en/publications/graph-learning`;

        it('should read title, year, authors and abstract from the page body', () => {
            const page = extractor.extract(
                url,
                `<html><head><title>Portal page</title></head><body>
                 <h1> Graph   Learning at Scale </h1>
                 <p>Published 2021</p>
                 <a href="/en/persons/ada">Ada Lovelace</a>
                 <a href="/en/persons/grace-hopper">Grace Hopper</a>
                 <a href="/en/persons/ada">Ada Lovelace</a>
                 <h2>Abstract</h2>
                 <div>We study graph learning.</div>
                 </body></html>`
            );

            expect(page.publication).toEqual({
                publication_url: url,
                title: 'Graph Learning at Scale',
                year: '2021',
                authors: ['Ada Lovelace', 'Grace Hopper'],
                author_urls: [`${BASE}/en/persons/ada`, `${BASE}/en/persons/grace-hopper`],
                abstract: 'We study graph learning.',
            });
        });

        it('should fall back to citation meta tags', () => {
            const page = extractor.extract(
                url,
                `<html><head>
                 <meta name="citation_title" content="Meta Title">
                 <meta name="citation_publication_date" content="2019/03/02">
                 <meta name="citation_author" content="Lovelace, Ada">
                 <meta name="citation_author" content="Hopper, Grace">
                 <meta name="citation_abstract" content="Meta abstract.">
                 </head><body><p>Copyright 2024</p></body></html>`
            );

            expect(page.publication).toMatchObject({
                title: 'Meta Title',
                year: '2019',
                authors: ['Lovelace, Ada', 'Hopper, Grace'],
                author_urls: [],
                abstract: 'Meta abstract.',
            });
        });

        it('should use og:title, then the document title', () => {
            const og = extractor.extract(url, '<head><meta property="og:title" content="Open Graph Title"></head>');
            expect(og.publication?.title).toBe('Open Graph Title');

            const plain = extractor.extract(url, '<head><title>Document Title</title></head><body></body>');
            expect(plain.publication?.title).toBe('Document Title');
        });

        it('should use the description meta when there is no abstract', () => {
            const page = extractor.extract(url, '<head><meta name="description" content="Short summary"></head>');
            expect(page.publication?.abstract).toBe('Short summary');
            expect(page.publication?.year).toBe('');
        });

        it('should honour a custom publication pattern', () => {
            const custom = new PortalPageExtractor({ publicationPattern: '/outputs/' });
            expect(custom.extract(url, '<h1>T</h1>').publication).toBeNull();
            expect(custom.extract(`${BASE}/outputs/1`, '<h1>T</h1>').publication?.title).toBe('T');
        });
    });
});
