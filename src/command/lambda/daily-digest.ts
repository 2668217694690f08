import * as os from 'os';
import * as path from 'path';
import { ScheduledEvent } from 'aws-lambda';
import { DigestConfiguration } from '@/domain/digest-config';
import { ConfigLoader } from '@/utils/config-loader';
import { createDigestService } from '@/command/create-digest-service';
import { logger, errorMessage } from '@/utils/logger';

const configLoader = ConfigLoader.getInstance();

// Event interface that supports both scheduled events and manual test invocations
interface DailyDigestEvent extends Partial<ScheduledEvent> {
    article_lookback_hours?: number;
    detail?: {
        article_lookback_hours?: number; // EventBridge puts custom params in detail object
    };
}

// The deployment package is read-only; relative report paths go under /tmp.
export function writableOutputDir(outputDir: string): string {
    return path.isAbsolute(outputDir) ? outputDir : path.join(os.tmpdir(), outputDir);
}

export const lambdaHandler = async (event: DailyDigestEvent): Promise<void> => {
    const lookbackHoursOverride = event.article_lookback_hours || event.detail?.article_lookback_hours;

    logger.info('Daily digest Lambda triggered', {
        time: event.time,
        region: event.region,
        lookbackHoursOverride,
    });

    try {
        const config = configLoader.loadConfig(process.env.DIGEST_CONFIG_PATH, {
            strict: process.env.DIGEST_CONFIG_STRICT === 'true',
        });

        const runConfig: DigestConfiguration = {
            ...config,
            scan_config: lookbackHoursOverride
                ? { ...config.scan_config, article_lookback_hours: lookbackHoursOverride }
                : config.scan_config,
            storage: { ...config.storage, output_dir: writableOutputDir(config.storage.output_dir) },
        };

        if (lookbackHoursOverride) {
            logger.info('Overriding article_lookback_hours from event', {
                original: config.scan_config.article_lookback_hours,
                override: lookbackHoursOverride,
            });
        }

        const result = await createDigestService(runConfig).run();

        logger.info('Daily digest finished', {
            date: result.digest.date,
            reportPath: result.reportPath,
            archiveUrl: result.archiveUrl,
            emailSent: result.emailSent,
        });
    } catch (error) {
        logger.error('Daily digest failed', { error: errorMessage(error) });
        throw error;
    }
};
