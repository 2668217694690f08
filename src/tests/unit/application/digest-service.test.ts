import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DigestService, DigestServiceDependencies } from '@/application/digest-service';
import { ArticleService } from '@/application/article-service';
import { VulnerabilityService } from '@/application/vulnerability-service';
import { BlogService } from '@/application/blog-service';
import { Article, BlogDigest, VulnerabilityRecord } from '@/domain/article';
import { DigestConfiguration } from '@/domain/digest-config';
import { EmailSender, SmtpEmailSender } from '@/infrastructure/email-sender';
import { KeywordImpactAnalyzer } from '@/infrastructure/impact-analyzer';
import { LocalReportStorage, ReportStorage } from '@/infrastructure/report-storage';
import { TextReportRenderer } from '@/infrastructure/text-report-renderer';
import { buildTestConfig } from '../../helpers/test-config';

const generatedAt = new Date(Date.UTC(2026, 9, 19, 14, 30, 5));

class StubArticleService {
    constructor(private readonly articles: Article[]) {}

    async collectArticles(): Promise<Article[]> {
        return this.articles;
    }
}

class StubVulnerabilityService {
    constructor(private readonly records: VulnerabilityRecord[]) {}

    async collectVulnerabilities(): Promise<VulnerabilityRecord[]> {
        return this.records;
    }
}

class StubBlogService {
    constructor(private readonly blogs: BlogDigest[]) {}

    async collectBlogs(): Promise<BlogDigest[]> {
        return this.blogs;
    }
}

class RecordingStorage implements ReportStorage {
    public saved: Array<{ content: string; generatedAt: Date }> = [];

    constructor(private readonly location: string, private readonly failure?: Error) {}

    async saveReport(content: string, generatedAt: Date): Promise<string> {
        if (this.failure) {
            throw this.failure;
        }
        this.saved.push({ content, generatedAt });
        return this.location;
    }
}

class StubEmailSender implements EmailSender {
    public subjects: string[] = [];

    constructor(private readonly result: boolean) {}

    async send(_content: string, subject: string): Promise<boolean> {
        this.subjects.push(subject);
        return this.result;
    }
}

function article(title: string, overrides: Partial<Article> = {}): Article {
    return {
        title,
        link: `https://example.com/${encodeURIComponent(title)}`,
        description: '',
        published: '',
        published_at: null,
        source: 'Feed One',
        category: 'cybersecurity',
        priority: 0,
        ...overrides,
    };
}

function vulnerability(cveId: string): VulnerabilityRecord {
    return {
        cve_id: cveId,
        vendor_project: 'Acme',
        product: 'Gateway',
        vulnerability_name: 'Acme Gateway flaw',
        date_added: new Date(2026, 9, 18),
        short_description: 'Remote code execution.',
    };
}

function buildConfig(): DigestConfiguration {
    const config = buildTestConfig();
    return {
        ...config,
        content: {
            ...config.content,
            section_limits: { ...config.content.section_limits, cybersecurity: 1 },
        },
    };
}

function buildDependencies(overrides: Partial<DigestServiceDependencies> = {}): DigestServiceDependencies {
    const config = buildConfig();
    return {
        articleService: new StubArticleService([
            article('Ransomware shuts down plant', { priority: 2 }),
            article('Second cybersecurity story'),
            article('LLM jailbreak technique published', { category: 'ai' }),
        ]) as unknown as ArticleService,
        vulnerabilityService: new StubVulnerabilityService(
            ['CVE-2026-0001', 'CVE-2026-0002', 'CVE-2026-0003', 'CVE-2026-0004', 'CVE-2026-0005'].map(vulnerability),
        ) as unknown as VulnerabilityService,
        blogService: new StubBlogService([]) as unknown as BlogService,
        impactAnalyzer: new KeywordImpactAnalyzer(),
        renderer: new TextReportRenderer(config.content),
        storage: new RecordingStorage('newsletters/cyberbrief_20261019_143005.txt'),
        emailSender: new StubEmailSender(false),
        clock: () => generatedAt,
        ...overrides,
    };
}

describe('DigestService', () => {
    it('fills each section up to its limit and enriches the articles', async () => {
        const service = new DigestService(buildConfig(), buildDependencies());

        const digest = await service.buildDigest();

        expect(digest.date).toBe('2026-10-19');
        expect(digest.timezone).toBe('UTC');
        expect(digest.sections.cybersecurity.map((a) => a.title)).toEqual(['Ransomware shuts down plant']);
        expect(digest.sections.regulation).toEqual([]);
        expect(digest.sections.ai.map((a) => a.title)).toEqual(['LLM jailbreak technique published']);
        expect(digest.sections.cybersecurity[0].summary).toBe(
            'Ransomware attack or campaign identified with potential business impact on targeted organizations.',
        );
        expect(digest.sections.cybersecurity[0].impact).toMatch(/^BUSINESS IMPACT: HIGH - Ransomware/);
        expect(digest.vulnerabilities.map((v) => v.cve_id)).toEqual([
            'CVE-2026-0001',
            'CVE-2026-0002',
            'CVE-2026-0003',
            'CVE-2026-0004',
        ]);
        expect(digest.sources).toEqual([
            'BleepingComputer',
            'Krebs on Security',
            'Schneier on Security',
            'SANS ISC Diary',
            'Threatpost',
            'CISA KEV',
        ]);
    });

    it('saves the report and tries to email it', async () => {
        const storage = new RecordingStorage('newsletters/cyberbrief_20261019_143005.txt');
        const emailSender = new StubEmailSender(true);
        const service = new DigestService(buildConfig(), buildDependencies({ storage, emailSender }));

        const result = await service.run();

        expect(result.reportPath).toBe('newsletters/cyberbrief_20261019_143005.txt');
        expect(result.emailSent).toBe(true);
        expect(storage.saved).toHaveLength(1);
        expect(storage.saved[0].content).toBe(result.content);
        expect(storage.saved[0].generatedAt).toBe(generatedAt);
        expect(emailSender.subjects).toEqual(['CyberBrief Daily - October 19, 2026']);
        expect(result.content.startsWith('CYBERBRIEF DAILY\n')).toBe(true);
    });

    it('keeps the saved report when email is not sent', async () => {
        const storage = new RecordingStorage('newsletters/report.txt');
        const service = new DigestService(buildConfig(), buildDependencies({ storage }));

        const result = await service.run();

        expect(result.emailSent).toBe(false);
        expect(result.reportPath).toBe('newsletters/report.txt');
        expect(storage.saved).toHaveLength(1);
    });

    it('treats an archive failure as non-fatal', async () => {
        const archive = new RecordingStorage('unused', new Error('AccessDenied'));
        const emailSender = new StubEmailSender(true);
        const service = new DigestService(buildConfig(), buildDependencies({ archive, emailSender }));

        const result = await service.run();

        expect(result.archiveUrl).toBeUndefined();
        expect(result.emailSent).toBe(true);
    });

    it('returns the archive location when archiving succeeds', async () => {
        const archive = new RecordingStorage('https://digest-archive.s3.us-east-1.amazonaws.com/reports/x.txt');
        const service = new DigestService(buildConfig(), buildDependencies({ archive }));

        const result = await service.run();

        expect(result.archiveUrl).toBe('https://digest-archive.s3.us-east-1.amazonaws.com/reports/x.txt');
    });

    it('fails without emailing when the report cannot be saved', async () => {
        const emailSender = new StubEmailSender(true);
        const storage = new RecordingStorage('unused', new Error('EACCES: permission denied'));
        const service = new DigestService(buildConfig(), buildDependencies({ storage, emailSender }));

        await expect(service.run()).rejects.toThrow('EACCES: permission denied');
        expect(emailSender.subjects).toEqual([]);
    });

    it('persists the report when email credentials are absent', async () => {
        const config = buildConfig();
        const outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cyberbrief-run-'));
        try {
            const service = new DigestService(
                config,
                buildDependencies({
                    storage: new LocalReportStorage({ outputDir, filePrefix: 'cyberbrief', timezone: 'UTC' }),
                    emailSender: new SmtpEmailSender(config.email),
                }),
            );

            const result = await service.run();

            expect(result.emailSent).toBe(false);
            expect(result.reportPath).toBe(path.join(outputDir, 'cyberbrief_20261019_143005.txt'));
            expect(fs.readFileSync(result.reportPath, 'utf8')).toBe(result.content);
        } finally {
            fs.rmSync(outputDir, { recursive: true, force: true });
        }
    });
});
