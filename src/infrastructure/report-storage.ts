import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { S3 } from '@aws-sdk/client-s3';
import { logger, errorMessage } from '@/utils/logger';
import { formatCompactTimestamp, formatIsoDay } from '@/utils/date-format';

export interface ReportStorage {
    /** Persists one rendered digest and resolves to where it ended up. */
    saveReport(content: string, generatedAt: Date): Promise<string>;
}

export function reportFileName(prefix: string, generatedAt: Date, timeZone: string): string {
    return `${prefix}_${formatCompactTimestamp(generatedAt, timeZone)}.txt`;
}

export interface LocalReportStorageOptions {
    outputDir: string;
    filePrefix: string;
    timezone: string;
}

export class LocalReportStorage implements ReportStorage {
    constructor(private readonly options: LocalReportStorageOptions) {}

    async saveReport(content: string, generatedAt: Date): Promise<string> {
        const fileName = reportFileName(this.options.filePrefix, generatedAt, this.options.timezone);
        const filePath = path.join(this.options.outputDir, fileName);

        try {
            await mkdir(this.options.outputDir, { recursive: true });
            await writeFile(filePath, content, 'utf8');
            logger.info('Report saved', { path: filePath });
            return filePath;
        } catch (error) {
            logger.error('Failed to save report', { error: errorMessage(error), path: filePath });
            throw error;
        }
    }
}

export interface S3ReportStorageOptions {
    bucketName: string;
    region: string;
    filePrefix: string;
    timezone: string;
    client?: S3;
}

export class S3ReportStorage implements ReportStorage {
    private readonly s3: S3;

    constructor(private readonly options: S3ReportStorageOptions) {
        this.s3 = options.client ?? new S3({ region: options.region });
    }

    async saveReport(content: string, generatedAt: Date): Promise<string> {
        const { bucketName, region, filePrefix, timezone } = this.options;
        const key = `reports/${formatIsoDay(generatedAt, timezone)}/${reportFileName(filePrefix, generatedAt, timezone)}`;

        try {
            await this.s3.putObject({
                Bucket: bucketName,
                Key: key,
                Body: content,
                ContentType: 'text/plain; charset=utf-8',
                CacheControl: 'no-cache',
            });

            const reportUrl = `https://${bucketName}.s3.${region}.amazonaws.com/${key}`;
            logger.info('Report archived to S3', { reportUrl, bucket: bucketName });
            return reportUrl;
        } catch (error) {
            logger.error('Failed to archive report to S3', { error: errorMessage(error), bucket: bucketName, key });
            throw error;
        }
    }
}
