import { categorize } from '@/domain/categorizer';
import { buildTestConfig } from '../../helpers/test-config';

describe('categorize', () => {
    const { categories } = buildTestConfig();

    it('files an article matching both AI and regulation terms under ai', () => {
        expect(categorize('New LLM regulation from FTC', '', categories)).toBe('ai');
    });

    it('files regulator actions under regulation', () => {
        expect(categorize('Retailer agrees to pay $2M over data leak', '', categories)).toBe('regulation');
        expect(categorize('GDPR fine issued', 'Privacy watchdog acts', categories)).toBe('regulation');
    });

    it('falls back to cybersecurity when no rule matches', () => {
        expect(categorize('Router firmware patched', 'Vendor ships fixes for exploited bug', categories)).toBe(
            'cybersecurity',
        );
    });

    it('looks at the description as well as the title', () => {
        expect(categorize('Weekly roundup', 'Prompt injection hits chat assistants', categories)).toBe('ai');
    });

    it('honours the configured rule order', () => {
        const reordered = [...categories].reverse();
        expect(categorize('New LLM regulation from FTC', '', reordered)).toBe('regulation');
    });

    it('returns the same category for the same input', () => {
        const first = categorize('Treasury warns banks', 'Sanctions update', categories);
        const second = categorize('Treasury warns banks', 'Sanctions update', categories);
        expect(first).toBe(second);
    });
});
