import { DigestConfiguration } from '@/domain/digest-config';
import { ArticleService } from '@/application/article-service';
import { BlogService } from '@/application/blog-service';
import { DigestService } from '@/application/digest-service';
import { VulnerabilityService } from '@/application/vulnerability-service';
import { RssBlogFetcher } from '@/infrastructure/blog-fetcher';
import { SmtpEmailSender } from '@/infrastructure/email-sender';
import { HttpFeedFetcher } from '@/infrastructure/feed-fetcher';
import { ImpactAnalyzer, KeywordImpactAnalyzer, OpenAIImpactAnalyzer } from '@/infrastructure/impact-analyzer';
import { LocalReportStorage, S3ReportStorage } from '@/infrastructure/report-storage';
import { TextReportRenderer } from '@/infrastructure/text-report-renderer';
import { logger } from '@/utils/logger';

function createImpactAnalyzer(config: DigestConfiguration): ImpactAnalyzer {
    const { openai } = config;
    if (openai.enabled && openai.api_key) {
        logger.info('AI impact analysis enabled', { model: openai.model });
        return new OpenAIImpactAnalyzer({
            apiKey: openai.api_key,
            model: openai.model,
            maxTokens: openai.max_tokens,
        });
    }
    if (openai.enabled) {
        logger.warn('OpenAI enabled without an API key, using keyword impact analysis');
    }
    return new KeywordImpactAnalyzer();
}

export function createDigestService(config: DigestConfiguration): DigestService {
    const { scan_config, storage } = config;
    const fetcher = new HttpFeedFetcher({
        userAgent: scan_config.user_agent,
        timeoutMs: scan_config.fetch_timeout_ms,
    });

    const archive = storage.s3_bucket
        ? new S3ReportStorage({
              bucketName: storage.s3_bucket,
              region: storage.s3_region || 'us-east-1',
              filePrefix: storage.file_prefix,
              timezone: scan_config.timezone,
          })
        : undefined;

    return new DigestService(config, {
        articleService: new ArticleService(config, fetcher),
        vulnerabilityService: new VulnerabilityService(config, fetcher),
        blogService: new BlogService(
            config,
            new RssBlogFetcher({ userAgent: scan_config.user_agent, timeoutMs: scan_config.fetch_timeout_ms }),
        ),
        impactAnalyzer: createImpactAnalyzer(config),
        renderer: new TextReportRenderer(config.content),
        storage: new LocalReportStorage({
            outputDir: storage.output_dir,
            filePrefix: storage.file_prefix,
            timezone: scan_config.timezone,
        }),
        archive,
        emailSender: new SmtpEmailSender(config.email),
    });
}
