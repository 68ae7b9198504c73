import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, PAPER_SOURCES, SOURCE_DISPLAY_NAMES, isPaperSource } from '../types/index.js';

describe('Types', () => {
    describe('PaperSource', () => {
        it('should list Semantic Scholar before arXiv', () => {
            expect(PAPER_SOURCES).toEqual(['semantic_scholar', 'arxiv']);
        });

        it('should have a display name for every source', () => {
            for (const source of PAPER_SOURCES) {
                expect(SOURCE_DISPLAY_NAMES[source]).toBeTruthy();
            }
        });

        it('should recognize only known sources', () => {
            expect(isPaperSource('arxiv')).toBe(true);
            expect(isPaperSource('semantic_scholar')).toBe(true);
            expect(isPaperSource('openalex')).toBe(false);
            expect(isPaperSource('ArXiv')).toBe(false);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should listen on localhost:8000', () => {
            expect(DEFAULT_CONFIG.server).toEqual({ host: 'localhost', port: 8000 });
        });

        it('should allow the local frontend origin', () => {
            expect(DEFAULT_CONFIG.cors.origins).toEqual(['http://localhost:3000']);
        });

        it('should use the ai_research_hub database', () => {
            expect(DEFAULT_CONFIG.database.path).toBe('./ai_research_hub.db');
        });

        it('should search both sources, 20 results by default', () => {
            expect(DEFAULT_CONFIG.search.defaultSources).toEqual(['semantic_scholar', 'arxiv']);
            expect(DEFAULT_CONFIG.search.defaultLimit).toBe(20);
            expect(DEFAULT_CONFIG.search.defaultLimit).toBeLessThanOrEqual(DEFAULT_CONFIG.search.maxLimit);
        });

        it('should analyze with llama3.2 at temperature 0.7 and top_p 0.9', () => {
            expect(DEFAULT_CONFIG.ollama).toMatchObject({ model: 'llama3.2', temperature: 0.7, topP: 0.9 });
        });
    });
});
