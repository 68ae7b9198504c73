import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildAnalysisPrompt, parseAnalysis } from '../analysis/analysis-parser.js';
import { OllamaProvider, modelMatches } from '../analysis/ollama-provider.js';
import { PaperAnalyzer } from '../analysis/paper-analyzer.js';
import { ResearchService } from '../research/research-service.js';
import { HubDatabase } from '../storage/database.js';
import { HttpClient } from '../utils/http-client.js';
import { NotFoundError, UpstreamError } from '../utils/errors.js';
import type {
    LlmCompletionParams,
    LlmCompletionResult,
    LlmHealthReport,
    LlmProvider,
    Paper,
    SearchOptions,
    SourceAdapter,
} from '../types/index.js';

const PLAIN_ANSWER = `Here is the analysis you asked for.

1. Summary: The paper introduces a graph method.
It scales to large corpora.

2. Key Findings:
- Citation graphs reveal clusters
- Clusters match fields
* Small fields merge

3. Methodology Overview:
The authors build a citation graph.
They run community detection.

4. Potential Applications:
1. Literature review
2. Grant assessment

5. Future Research Directions:
• Dynamic graphs`;

const MARKDOWN_ANSWER = `## Summary
A concise overview.

**Key Findings**
- First finding

### Methodology
Surveys.

**Potential Applications:** Teaching
- Tooling

## Future Work
- Longitudinal study`;

describe('parseAnalysis', () => {
    it('should split numbered "label:" sections', () => {
        expect(parseAnalysis(PLAIN_ANSWER)).toEqual({
            summary: 'The paper introduces a graph method. It scales to large corpora.',
            key_findings: ['Citation graphs reveal clusters', 'Clusters match fields', 'Small fields merge'],
            methodology: 'The authors build a citation graph. They run community detection.',
            applications: ['Literature review', 'Grant assessment'],
            future_work: ['Dynamic graphs'],
        });
    });

    it('should recognize markdown headings and bold headers', () => {
        expect(parseAnalysis(MARKDOWN_ANSWER)).toEqual({
            summary: 'A concise overview.',
            key_findings: ['First finding'],
            methodology: 'Surveys.',
            applications: ['Teaching', 'Tooling'],
            future_work: ['Longitudinal study'],
        });
    });

    it('should not treat long sentences with a colon as headers', () => {
        const analysis = parseAnalysis(`Summary:
The main result of this work on methodology is clear: it works.`);

        expect(analysis.summary).toBe('The main result of this work on methodology is clear: it works.');
        expect(analysis.methodology).toBe('');
    });

    it('should keep bulleted "label:" lines as content of the current section', () => {
        const analysis = parseAnalysis(`Key Findings:
- Accuracy: improves by 5%
- Applications: wide range of robotics tasks
- Cost is lower
Methodology Overview: Ablations.
Potential Applications:
- Teaching`);

        expect(analysis).toEqual({
            summary: '',
            key_findings: ['Accuracy: improves by 5%', 'Applications: wide range of robotics tasks', 'Cost is lower'],
            methodology: 'Ablations.',
            applications: ['Teaching'],
            future_work: [],
        });
    });

    it('should return empty sections for unstructured text', () => {
        expect(parseAnalysis('I cannot analyze this paper.')).toEqual({
            summary: '',
            key_findings: [],
            methodology: '',
            applications: [],
            future_work: [],
        });
    });
});

describe('buildAnalysisPrompt', () => {
    it('should include title, authors and abstract', () => {
        const prompt = buildAnalysisPrompt({ title: 'A Paper', authors: ['Ada', 'Alan'], abstract: 'Text.' });

        expect(prompt).toContain('Title: A Paper\nAuthors: Ada, Alan\nAbstract: Text.');
        expect(prompt).toContain('5. Future Research Directions');
    });

    it('should note a missing abstract', () => {
        expect(buildAnalysisPrompt({ title: 'T', authors: [], abstract: null }))
            .toContain('Abstract: No abstract available.');
    });
});

describe('OllamaProvider', () => {
    let mockFetch: ReturnType<typeof vi.fn>;
    const httpClient = () => new HttpClient({ maxRetries: 0 });

    beforeEach(() => {
        mockFetch = vi.fn();
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    function json(body: unknown, status = 200): Response {
        return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
    }

    it('should post a non-streaming generate request', async () => {
        mockFetch.mockResolvedValue(json({ model: 'llama3.2', response: 'Summary: ok', prompt_eval_count: 12, eval_count: 30 }));
        const provider = new OllamaProvider({ baseUrl: 'http://ollama.test:11434/', model: 'llama3.2', httpClient: httpClient() });

        const result = await provider.complete('Analyze', { maxTokens: 256, systemPrompt: 'Be brief.' });

        expect(result).toEqual({
            text: 'Summary: ok',
            usage: { promptTokens: 12, completionTokens: 30, totalTokens: 42 },
            model: 'llama3.2',
            provider: 'ollama',
        });

        expect(mockFetch.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/generate');
        const init = mockFetch.mock.calls[0]?.[1];
        expect(JSON.parse(init.body)).toEqual({
            model: 'llama3.2',
            prompt: 'Analyze',
            stream: false,
            options: { temperature: 0.7, top_p: 0.9, num_predict: 256 },
            system: 'Be brief.',
        });
    });

    it('should reject unexpected generate payloads', async () => {
        mockFetch.mockResolvedValue(json({ done: true }));
        const provider = new OllamaProvider({ baseUrl: 'http://ollama.test', model: 'llama3.2', httpClient: httpClient() });

        await expect(provider.complete('x')).rejects.toThrow('Unexpected response from Ollama /api/generate');
    });

    it('should report healthy when the model is pulled', async () => {
        mockFetch.mockResolvedValue(json({ models: [{ name: 'mistral:7b' }, { name: 'llama3.2:latest' }] }));
        const provider = new OllamaProvider({ baseUrl: 'http://ollama.test', model: 'llama3.2', httpClient: httpClient() });

        expect(await provider.checkHealth()).toEqual({ status: 'healthy', model: 'llama3.2' });
        expect(mockFetch.mock.calls[0]?.[0]).toBe('http://ollama.test/api/tags');
    });

    it('should report unhealthy when the model is missing', async () => {
        mockFetch.mockResolvedValue(json({ models: [{ name: 'mistral:7b' }] }));
        const provider = new OllamaProvider({ baseUrl: 'http://ollama.test', model: 'llama3.2', httpClient: httpClient() });

        expect(await provider.checkHealth()).toEqual({
            status: 'unhealthy',
            model: 'llama3.2',
            error: 'Model llama3.2 is not available',
        });
    });

    it('should report unhealthy when the server is unreachable', async () => {
        mockFetch.mockRejectedValue(new Error('connect refused'));
        const provider = new OllamaProvider({ baseUrl: 'http://ollama.test', model: 'llama3.2', httpClient: httpClient() });

        expect(await provider.checkHealth()).toEqual({
            status: 'unhealthy',
            model: 'llama3.2',
            error: 'Network error: connect refused',
        });
    });

    it('should treat a bare name as the latest tag', () => {
        expect(modelMatches('llama3.2:latest', 'llama3.2')).toBe(true);
        expect(modelMatches('llama3.2', 'llama3.2:latest')).toBe(true);
        expect(modelMatches('llama3.2:1b', 'llama3.2')).toBe(false);
    });
});

class StubLlm implements LlmProvider {
    readonly name = 'stub';
    readonly model = 'stub-model';
    readonly complete = vi.fn<(prompt: string, params?: LlmCompletionParams) => Promise<LlmCompletionResult>>();

    constructor(text = 'Summary: Stubbed summary.\nKey Findings:\n- One') {
        this.complete.mockResolvedValue({
            text,
            usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
            model: this.model,
            provider: this.name,
        });
    }

    async checkHealth(): Promise<LlmHealthReport> {
        return { status: 'healthy', model: this.model };
    }
}

const PAPER: Paper = {
    source: 'semantic_scholar',
    source_id: 's2-paper',
    doi: '10.1234/abc',
    arxiv_id: null,
    title: 'Stored Paper',
    abstract: 'Abstract.',
    authors: ['Ada Lovelace'],
    year: 2023,
    venue: 'Venue',
    url: 'https://example.com/paper',
    citations: 7,
};

class StubSource implements SourceAdapter {
    readonly name = 'Semantic Scholar';
    readonly sourceId = 'semantic_scholar' as const;
    readonly fetchPaper = vi.fn<(id: string) => Promise<Paper | null>>();

    async search(_query: string, _options: SearchOptions): Promise<Paper[]> {
        return [];
    }
}

describe('PaperAnalyzer', () => {
    let db: HubDatabase;
    let source: StubSource;
    let llm: StubLlm;
    let analyzer: PaperAnalyzer;

    beforeEach(() => {
        db = new HubDatabase(':memory:');
        source = new StubSource();
        source.fetchPaper.mockResolvedValue(PAPER);
        llm = new StubLlm();
        analyzer = new PaperAnalyzer(new ResearchService([source]), llm, db);
    });

    afterEach(() => {
        db.close();
    });

    it('should analyze and store a paper', async () => {
        const analysis = await analyzer.analyzePaper('10.1234/abc');

        expect(source.fetchPaper).toHaveBeenCalledWith('DOI:10.1234/abc');
        expect(analysis).toMatchObject({
            source_id: 's2-paper',
            title: 'Stored Paper',
            authors: ['Ada Lovelace'],
            summary: 'Stubbed summary.',
            key_findings: ['One'],
            methodology: '',
        });
        expect(db.getPaperAnalysis('s2-paper')?.analysis_id).toBe(analysis.analysis_id);

        const params = llm.complete.mock.calls[0]?.[1];
        expect(params?.systemPrompt).toContain('research assistant');
    });

    it('should reuse a stored analysis without calling the LLM again', async () => {
        await analyzer.analyzePaper('10.1234/abc');
        await analyzer.analyzePaper('10.1234/abc');
        await analyzer.analyzePaper('s2-paper');

        expect(llm.complete).toHaveBeenCalledTimes(1);
        // The stored row is found under its source id before any lookup
        expect(source.fetchPaper).toHaveBeenCalledTimes(2);
    });

    it('should share one analysis between concurrent requests', async () => {
        const [first, second] = await Promise.all([
            analyzer.analyzePaper('s2-paper'),
            analyzer.analyzePaper('s2-paper'),
        ]);

        expect(first).toEqual(second);
        expect(llm.complete).toHaveBeenCalledTimes(1);
        expect(source.fetchPaper).toHaveBeenCalledTimes(1);
    });

    it('should throw NotFoundError for unknown papers', async () => {
        source.fetchPaper.mockResolvedValue(null);

        await expect(analyzer.analyzePaper('nope')).rejects.toBeInstanceOf(NotFoundError);
        expect(llm.complete).not.toHaveBeenCalled();
    });

    it('should wrap LLM failures in UpstreamError', async () => {
        llm.complete.mockRejectedValue(new Error('model not loaded'));

        const error = await analyzer.analyzePaper('s2-paper').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(UpstreamError);
        expect(error).toMatchObject({ message: 'Failed to analyze paper: model not loaded', details: { provider: 'stub' } });
        expect(db.getPaperAnalysis('s2-paper')).toBeUndefined();
    });
});
