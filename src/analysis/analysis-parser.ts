import type { AnalysisSection, Paper, PaperAnalysis } from '../types/index.js';

export const ANALYSIS_SYSTEM_PROMPT =
    'You are a research assistant who writes concise, factual analyses of scientific papers.';

/**
 * Prompt asking for the five sections `parseAnalysis` understands.
 */
export function buildAnalysisPrompt(paper: Pick<Paper, 'title' | 'authors' | 'abstract'>): string {
    return `Analyze the following research paper:

Title: ${paper.title}
Authors: ${paper.authors.join(', ')}
Abstract: ${paper.abstract ?? 'No abstract available.'}

Please provide a structured analysis with the following sections:
1. Summary (2-3 sentences)
2. Key Findings (bullet points)
3. Methodology Overview
4. Potential Applications
5. Future Research Directions

Format the response in a clear, structured way.`;
}

/** Longest "label:" prefix still read as a header */
const MAX_LABEL_WORDS = 5;

const LIST_SECTIONS = new Set<AnalysisSection>(['key_findings', 'applications', 'future_work']);

const BULLET = /^(?:[-*•])\s+/;
const NUMBERING = /^\d+[.)]\s*/;

/**
 * Which section a label names, if any. Order matters: "Summary of
 * Methodology" is a summary.
 */
function matchSection(label: string): AnalysisSection | null {
    const lower = label.toLowerCase();
    if (lower.includes('summary')) return 'summary';
    if (lower.includes('key findings')) return 'key_findings';
    if (lower.includes('methodology')) return 'methodology';
    if (lower.includes('applications')) return 'applications';
    if (lower.includes('future') && (lower.includes('research') || lower.includes('work'))) return 'future_work';
    return null;
}

function stripDecoration(text: string): string {
    return text.replace(/\*\*/g, '').replace(NUMBERING, '').trim();
}

/**
 * Recognize a section header. Returns the section and any text that
 * followed the colon on the same line. Within a section a bulleted
 * "label:" line is content, not a header.
 */
function parseHeader(line: string, inSection: boolean): { section: AnalysisSection; rest: string } | null {
    if (line.startsWith('#')) {
        const section = matchSection(stripDecoration(line.replace(/^#+/, '')));
        return section ? { section, rest: '' } : null;
    }

    if (/^\*\*.+\*\*:?$/.test(line)) {
        const section = matchSection(stripDecoration(line.replace(/:$/, '')));
        return section ? { section, rest: '' } : null;
    }

    if (inSection && BULLET.test(line)) return null;

    const colon = line.indexOf(':');
    if (colon < 0) return null;

    const label = stripDecoration(line.slice(0, colon));
    if (!label || label.split(/\s+/).length > MAX_LABEL_WORDS) return null;

    const section = matchSection(label);
    if (!section) return null;

    return { section, rest: line.slice(colon + 1).replace(/^\*\*/, '').trim() };
}

function cleanContentLine(line: string, section: AnalysisSection): string {
    let text = line.replace(BULLET, '');
    if (LIST_SECTIONS.has(section)) {
        text = text.replace(NUMBERING, '');
    }
    return text.trim();
}

/**
 * Split an LLM answer into the five analysis sections.
 */
export function parseAnalysis(text: string): PaperAnalysis {
    const lines: Record<AnalysisSection, string[]> = {
        summary: [],
        key_findings: [],
        methodology: [],
        applications: [],
        future_work: [],
    };

    let current: AnalysisSection | null = null;

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line) continue;

        const header = parseHeader(line, current !== null);
        if (header) {
            current = header.section;
            // A repeated header starts the section over
            lines[current] = [];
            const inline = cleanContentLine(header.rest, current);
            if (inline) lines[current].push(inline);
            continue;
        }

        if (current) {
            const content = cleanContentLine(line, current);
            if (content) lines[current].push(content);
        }
    }

    return {
        summary: lines.summary.join(' '),
        key_findings: lines.key_findings,
        methodology: lines.methodology.join(' '),
        applications: lines.applications,
        future_work: lines.future_work,
    };
}
