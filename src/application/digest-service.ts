import { ARTICLE_CATEGORIES, Article, DigestArticle, DigestResult, DigestSections } from '@/domain/article';
import { DigestConfiguration } from '@/domain/digest-config';
import { summarizeArticle } from '@/domain/article-summary';
import { ImpactAnalyzer } from '@/infrastructure/impact-analyzer';
import { ReportRenderer } from '@/infrastructure/text-report-renderer';
import { ReportStorage } from '@/infrastructure/report-storage';
import { EmailSender, buildSubject } from '@/infrastructure/email-sender';
import { formatIsoDay } from '@/utils/date-format';
import { logger, errorMessage } from '@/utils/logger';
import { ArticleService } from './article-service';
import { VulnerabilityService } from './vulnerability-service';
import { BlogService } from './blog-service';

export interface DigestServiceDependencies {
    articleService: ArticleService;
    vulnerabilityService: VulnerabilityService;
    blogService: BlogService;
    impactAnalyzer: ImpactAnalyzer;
    renderer: ReportRenderer;
    storage: ReportStorage;
    archive?: ReportStorage;
    emailSender: EmailSender;
    clock?: () => Date;
}

export interface DigestRunResult {
    digest: DigestResult;
    content: string;
    reportPath: string;
    archiveUrl?: string;
    emailSent: boolean;
}

export class DigestService {
    private readonly clock: () => Date;

    constructor(private config: DigestConfiguration, private deps: DigestServiceDependencies) {
        this.clock = deps.clock ?? (() => new Date());
    }

    async buildDigest(): Promise<DigestResult> {
        const generatedAt = this.clock();
        const timezone = this.config.scan_config.timezone;

        logger.info('Starting digest generation', {
            timezone,
            articleLookbackHours: this.config.scan_config.article_lookback_hours,
        });

        const articles = await this.deps.articleService.collectArticles();
        const vulnerabilities = await this.deps.vulnerabilityService.collectVulnerabilities();
        const blogs = await this.deps.blogService.collectBlogs();
        const sections = await this.buildSections(articles);

        const digest: DigestResult = {
            date: formatIsoDay(generatedAt, timezone),
            timezone,
            generated_at: generatedAt,
            sections,
            vulnerabilities: vulnerabilities.slice(0, this.config.content.section_limits.vulnerabilities),
            blogs,
            sources: this.sourceNames(),
        };

        logger.info('Digest generated', {
            date: digest.date,
            cybersecurity: sections.cybersecurity.length,
            regulation: sections.regulation.length,
            ai: sections.ai.length,
            vulnerabilities: digest.vulnerabilities.length,
            blogs: digest.blogs.length,
        });

        return digest;
    }

    /**
     * Builds, renders and saves the digest, then tries to email it. Only a
     * failure to build or to save locally rejects; archive and email failures
     * are logged and reported in the result.
     */
    async run(): Promise<DigestRunResult> {
        const digest = await this.buildDigest();
        const content = this.deps.renderer.render(digest);

        const reportPath = await this.deps.storage.saveReport(content, digest.generated_at);

        let archiveUrl: string | undefined;
        if (this.deps.archive) {
            try {
                archiveUrl = await this.deps.archive.saveReport(content, digest.generated_at);
            } catch (error) {
                logger.warn('Report archive failed, continuing', { error: errorMessage(error) });
            }
        }

        const subject = buildSubject(this.config.email.subject_prefix, digest.generated_at, digest.timezone);
        const emailSent = await this.deps.emailSender.send(content, subject);

        if (emailSent) {
            logger.info('Digest completed - email sent', { reportPath });
        } else {
            logger.info('Digest completed - report saved to file only', { reportPath });
        }

        return { digest, content, reportPath, archiveUrl, emailSent };
    }

    private async buildSections(articles: Article[]): Promise<DigestSections> {
        const limits = this.config.content.section_limits;
        const sections: DigestSections = { cybersecurity: [], regulation: [], ai: [] };

        for (const category of ARTICLE_CATEGORIES) {
            const selected = articles.filter((article) => article.category === category).slice(0, limits[category]);
            for (const article of selected) {
                sections[category].push(await this.enrich(article));
            }
        }

        return sections;
    }

    private async enrich(article: Article): Promise<DigestArticle> {
        return {
            ...article,
            summary: summarizeArticle(article.title, article.description),
            impact: await this.deps.impactAnalyzer.analyze(article),
        };
    }

    private sourceNames(): string[] {
        const { articles, vulnerabilities } = this.config.sources;
        const names = articles.filter((source) => source.enabled).map((source) => source.name);
        if (vulnerabilities.enabled) {
            names.push(vulnerabilities.name);
        }
        return names;
    }
}
