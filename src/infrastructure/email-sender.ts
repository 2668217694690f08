import { createTransport } from 'nodemailer';
import { EmailConfig } from '@/domain/digest-config';
import { logger, errorMessage } from '@/utils/logger';
import { formatLongDate } from '@/utils/date-format';

export interface EmailSender {
    /** Resolves to `true` when every recipient was sent the digest. Never rejects. */
    send(content: string, subject: string): Promise<boolean>;
}

export function buildSubject(prefix: string, date: Date, timeZone: string): string {
    return `${prefix} - ${formatLongDate(date, timeZone)}`;
}

export class SmtpEmailSender implements EmailSender {
    constructor(private readonly config: EmailConfig) {}

    async send(content: string, subject: string): Promise<boolean> {
        const { smtp_server, smtp_port, username, password, to_addresses } = this.config;

        if (!username || !password) {
            logger.info('Email not configured - report saved to file only');
            return false;
        }

        if (to_addresses.length === 0) {
            logger.warn('Email has no recipients configured');
            return false;
        }

        try {
            logger.info('Connecting to email server', { host: smtp_server, port: smtp_port });

            // STARTTLS upgrade on a plain connection, then AUTH.
            const transporter = createTransport({
                host: smtp_server,
                port: smtp_port,
                secure: false,
                requireTLS: true,
                auth: {
                    user: username,
                    pass: password,
                },
            });

            const from = this.config.from_address || username;
            for (const to of to_addresses) {
                const info = await transporter.sendMail({
                    from,
                    to,
                    subject,
                    text: content,
                });
                logger.info('Email sent successfully', { messageId: info.messageId, to });
            }

            logger.info('Digest sent', { recipients: to_addresses.length, subject });
            return true;
        } catch (error) {
            logger.error('Failed to send email', { error: errorMessage(error), host: smtp_server });
            return false;
        }
    }
}
