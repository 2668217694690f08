import { VulnerabilityService } from '@/application/vulnerability-service';
import { DigestConfiguration } from '@/domain/digest-config';
import { buildTestConfig } from '../../helpers/test-config';
import { StubFeedFetcher } from '../../helpers/stub-feed-fetcher';

const KEV_URL = 'https://kev.example.com/known_exploited_vulnerabilities.csv';
const now = new Date(2026, 9, 19, 12, 0, 0);

const KEV_CSV = [
    'cveID,vendorProject,product,vulnerabilityName,dateAdded,shortDescription,requiredAction,dueDate',
    'CVE-2026-2001,Acme,Gateway,Ten days old,2026-10-09,Old enough,Patch.,2026-10-30',
    'CVE-2026-2002,Globex,Portal,Twenty days old,2026-09-29,Too old,Patch.,2026-10-20',
    'CVE-2026-2003,Initech,Server,Yesterday,2026-10-18,Newest,Patch.,2026-11-08',
    'CVE-2026-2004,Umbrella,Agent,Two days old,2026-10-17,Recent,Patch.,2026-11-07',
].join('\n');

function configWith(overrides: Partial<DigestConfiguration['sources']['vulnerabilities']>): DigestConfiguration {
    const config = buildTestConfig();
    return {
        ...config,
        sources: {
            ...config.sources,
            vulnerabilities: { name: 'CISA KEV', url: KEV_URL, enabled: true, max_items: 6, ...overrides },
        },
    };
}

describe('VulnerabilityService', () => {
    it('keeps entries added within the window, newest first', async () => {
        const service = new VulnerabilityService(configWith({}), new StubFeedFetcher({ [KEV_URL]: KEV_CSV }), () => now);

        const records = await service.collectVulnerabilities();

        expect(records.map((r) => r.cve_id)).toEqual(['CVE-2026-2003', 'CVE-2026-2004', 'CVE-2026-2001']);
    });

    it('caps the list at max_items', async () => {
        const service = new VulnerabilityService(
            configWith({ max_items: 2 }),
            new StubFeedFetcher({ [KEV_URL]: KEV_CSV }),
            () => now,
        );

        const records = await service.collectVulnerabilities();

        expect(records.map((r) => r.cve_id)).toEqual(['CVE-2026-2003', 'CVE-2026-2004']);
    });

    it('does not fetch a disabled catalog', async () => {
        const fetcher = new StubFeedFetcher({ [KEV_URL]: KEV_CSV });
        const service = new VulnerabilityService(configWith({ enabled: false }), fetcher, () => now);

        await expect(service.collectVulnerabilities()).resolves.toEqual([]);
        expect(fetcher.requested).toEqual([]);
    });

    it('returns nothing when the catalog cannot be fetched', async () => {
        const service = new VulnerabilityService(configWith({}), new StubFeedFetcher({}), () => now);

        await expect(service.collectVulnerabilities()).resolves.toEqual([]);
    });
});
