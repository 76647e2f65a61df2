import type { Transporter } from 'nodemailer';
import nodemailer from 'nodemailer';
import { useEnv } from './helpers/env/index.js';
import { useLogger } from './helpers/logger/index.js';

let transporter: Transporter | null = null;

export default function getMailer(): Transporter {
	if (transporter) return transporter;

	const env = useEnv();
	const logger = useLogger();

	const transportName = String(env['EMAIL_TRANSPORT']).toLowerCase();

	switch (transportName) {
		case 'sendmail':
			transporter = nodemailer.createTransport({
				sendmail: true,
				newline: String(env['EMAIL_SENDMAIL_NEW_LINE'] ?? 'unix'),
				path: String(env['EMAIL_SENDMAIL_PATH'] ?? '/usr/sbin/sendmail'),
			});
			break;
		case 'smtp': {
			const user = env['EMAIL_SMTP_USER'];
			const pass = env['EMAIL_SMTP_PASSWORD'];

			transporter = nodemailer.createTransport({
				name: env['EMAIL_SMTP_NAME'] === undefined ? undefined : String(env['EMAIL_SMTP_NAME']),
				pool: env['EMAIL_SMTP_POOL'] === true,
				host: String(env['EMAIL_SMTP_HOST']),
				port: Number(env['EMAIL_SMTP_PORT'] ?? 587),
				secure: env['EMAIL_SMTP_SECURE'] === true,
				ignoreTLS: env['EMAIL_SMTP_IGNORE_TLS'] === true,
				auth: user || pass ? { user: String(user ?? ''), pass: String(pass ?? '') } : undefined,
				tls: { rejectUnauthorized: env['EMAIL_SMTP_TLS_REJECT_UNAUTHORIZED'] !== false },
			});
			break;
		}
		default:
			if (transportName !== 'development') {
				logger.warn('Illegal transport given for email. Check the EMAIL_TRANSPORT env var. Using development transport.');
			}

			transporter = nodemailer.createTransport({
				streamTransport: true,
				newline: 'unix',
				buffer: true,
			});

			transporter.use('compile', (mail, callback) => {
				logger.info({ from: mail.data.from, to: mail.data.to, subject: mail.data.subject }, 'Sending mail');
				callback();
			});
	}

	return transporter;
}
