import 'dotenv/config';
import { ConfigLoader } from '@/utils/config-loader';
import { createDigestService } from '@/command/create-digest-service';
import { logger, errorMessage } from '@/utils/logger';

interface CliArguments {
    configPath?: string;
    strict: boolean;
}

export function parseArguments(argv: string[]): CliArguments {
    const positional = argv.filter((arg) => !arg.startsWith('--'));
    return {
        configPath: positional[0] || process.env.DIGEST_CONFIG_PATH,
        strict: argv.includes('--strict') || process.env.DIGEST_CONFIG_STRICT === 'true',
    };
}

export async function main(argv: string[]): Promise<number> {
    const args = parseArguments(argv);

    try {
        const config = ConfigLoader.getInstance().loadConfig(args.configPath, { strict: args.strict });
        const result = await createDigestService(config).run();

        if (!result.emailSent) {
            process.stdout.write(`${result.content}\n`);
        }
        logger.info('Digest run complete', { reportPath: result.reportPath, emailSent: result.emailSent });
        return 0;
    } catch (error) {
        logger.error('Fatal error', { error: errorMessage(error) });
        return 1;
    }
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.error('Unhandled error', { error: errorMessage(error) });
            process.exitCode = 1;
        });
}
