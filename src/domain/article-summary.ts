import { load } from 'cheerio';
import { decide, keywordRule } from './decision-list';

const LONG_SUMMARY_LENGTH = 250;
const SUMMARY_BUDGET = 200;
const MIN_SENTENCE_CUT = 100;
const MIN_SUMMARY_LENGTH = 40;

const TITLE_FALLBACKS = [
    keywordRule(
        ['ransomware', 'ransom'],
        'Ransomware attack or campaign identified with potential business impact on targeted organizations.',
    ),
    keywordRule(
        ['vulnerability', 'flaw', 'bug'],
        'Security vulnerability discovered that could allow unauthorized access or system compromise.',
    ),
    keywordRule(
        ['breach', 'hack', 'compromise'],
        'Cybersecurity incident reported with potential data exposure or system compromise.',
    ),
    keywordRule(
        ['ai', 'artificial intelligence', 'machine learning'],
        'AI-related security development affecting enterprise systems or security practices.',
    ),
    keywordRule(
        ['regulation', 'compliance', 'legal', 'court'],
        'Regulatory or legal development affecting cybersecurity compliance requirements.',
    ),
    keywordRule(
        ['malware', 'trojan', 'virus'],
        'Malicious software discovered targeting business or enterprise environments.',
    ),
];

const GENERIC_FALLBACK = 'Cybersecurity development with potential implications for business operations.';

export function toPlainText(html: string): string {
    if (!html) {
        return '';
    }
    return load(html).root().text().replace(/\s+/g, ' ').trim();
}

/**
 * A few sentences for the digest: feed descriptions are stripped of markup and
 * shortened on a sentence boundary where possible. Descriptions too thin to be
 * useful are replaced by a stock sentence picked from the title.
 */
export function summarizeArticle(title: string, description: string): string {
    const text = toPlainText(description);
    let summary = text;

    if (text.length > LONG_SUMMARY_LENGTH) {
        // The whole ". " has to fit inside the budget.
        const sentenceEnd = text.lastIndexOf('. ', SUMMARY_BUDGET - 2);
        if (sentenceEnd > MIN_SENTENCE_CUT) {
            summary = text.slice(0, sentenceEnd + 1);
        } else {
            const head = text.slice(0, SUMMARY_BUDGET);
            const lastSpace = head.lastIndexOf(' ');
            summary = `${lastSpace > 0 ? head.slice(0, lastSpace) : head}...`;
        }
    }

    if (summary.length < MIN_SUMMARY_LENGTH) {
        return decide(TITLE_FALLBACKS, title.toLowerCase(), GENERIC_FALLBACK);
    }

    return summary.trim();
}

// Counts code points so an emoji is never split at the cut.
export function truncate(text: string, limit: number): string {
    const chars = Array.from(text);
    return chars.length > limit ? `${chars.slice(0, limit).join('')}...` : text;
}
