/**
 * Shared utilities for source adapters.
 */

const NEW_STYLE_ID = String.raw`\d{4}\.\d{4,5}(?:v\d+)?`;
const OLD_STYLE_ID = String.raw`[a-z-]+(?:\.[a-z]{2})?\/\d{7}(?:v\d+)?`;
const ARXIV_ID = `(${NEW_STYLE_ID}|${OLD_STYLE_ID})`;

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * Extract arXiv ID from various formats.
 * "https://arxiv.org/abs/2401.01234" → "2401.01234"
 * "arXiv:2401.01234" → "2401.01234"
 * "2401.01234v2" → "2401.01234v2"
 * "http://arxiv.org/abs/hep-th/9901001v1" → "hep-th/9901001v1"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        new RegExp(String.raw`arxiv\.org\/(?:abs|pdf)\/${ARXIV_ID}`, 'i'),
        new RegExp(`arxiv:${ARXIV_ID}`, 'i'),
        new RegExp(`^${ARXIV_ID}$`, 'i'),
    ];

    for (const pattern of patterns) {
        const match = input.trim().match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Collapse runs of whitespace (arXiv wraps titles and abstracts across lines).
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Key used to recognise the same paper coming back from two providers:
 * lower-cased title with whitespace collapsed. Empty for a blank title.
 */
export function normalizeTitle(title: string): string {
    return collapseWhitespace(title.toLowerCase());
}
