import { VulnerabilityRecord } from '@/domain/article';
import { DigestConfiguration } from '@/domain/digest-config';
import { days, isRecent } from '@/domain/recency';
import { FeedFetcher } from '@/infrastructure/feed-fetcher';
import { parseKevCsv } from '@/infrastructure/feed-parser';
import { logger } from '@/utils/logger';

export class VulnerabilityService {
    constructor(
        private config: DigestConfiguration,
        private fetcher: FeedFetcher,
        private clock: () => Date = () => new Date(),
    ) {}

    /** Recent KEV additions, newest first, at most `max_items` of them. */
    async collectVulnerabilities(): Promise<VulnerabilityRecord[]> {
        const source = this.config.sources.vulnerabilities;
        if (!source.enabled) {
            return [];
        }

        logger.info('Fetching vulnerability catalog', { source: source.name, url: source.url });

        const csv = await this.fetcher.fetchText(source.url);
        if (!csv) {
            return [];
        }

        const now = this.clock();
        const { vulnerability_lookback_days, date_fallback } = this.config.scan_config;
        const records = parseKevCsv(csv, { dateFallback: date_fallback.csv, now });

        const recent = records
            .filter((record) => isRecent(record.date_added, days(vulnerability_lookback_days), now, date_fallback.csv))
            .sort((a, b) => b.date_added.getTime() - a.date_added.getTime())
            .slice(0, source.max_items);

        logger.info('Vulnerabilities collected', {
            source: source.name,
            rows: records.length,
            recent: recent.length,
        });

        return recent;
    }
}
