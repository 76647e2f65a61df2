import fse from 'fs-extra';
import { Liquid } from 'liquidjs';
import type { SendMailOptions, Transporter } from 'nodemailer';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { useEnv } from '../../helpers/env/index.js';
import { InvalidPayloadError } from '../../helpers/errors/index.js';
import { useLogger } from '../../helpers/logger/index.js';
import getMailer from '../../mailer.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const SYSTEM_TEMPLATES_PATH = path.resolve(__dirname, 'templates');

export type TemplateData = Record<string, unknown>;

export type EmailOptions = SendMailOptions & {
	template?: {
		name: string;
		data: TemplateData;
	};
};

let liquidEngine: Liquid | null = null;

function getLiquidEngine(): Liquid {
	if (liquidEngine) return liquidEngine;

	const env = useEnv();

	liquidEngine = new Liquid({
		root: [path.resolve(String(env['EMAIL_TEMPLATES_PATH'])), SYSTEM_TEMPLATES_PATH],
		extname: '.liquid',
		outputEscape: 'escape',
	});

	return liquidEngine;
}

export class MailService {
	private logger = useLogger();
	private env = useEnv();
	private transporter: Transporter | null = null;

	get mailer(): Transporter {
		if (!this.transporter) {
			this.transporter = getMailer();

			if (this.env['EMAIL_VERIFY_SETUP'] === true) {
				this.transporter.verify((error) => {
					if (error) {
						this.logger.warn(error, 'Email connection failed');
					}
				});
			}
		}

		return this.transporter;
	}

	async send(options: EmailOptions): Promise<unknown> {
		const { template, ...emailOptions } = options;

		let { html } = options;

		if (template) {
			html = await this.renderTemplate(template.name, template.data);
		}

		if (typeof html === 'string') {
			// Some email clients start acting funky when line length exceeds 75 characters
			html = html
				.split('\n')
				.map((line) => line.trim())
				.join('\n');
		}

		this.logger.info(`Sending email to ${String(options.to)}`);

		return this.mailer.sendMail({
			...emailOptions,
			from: options.from ?? String(this.env['EMAIL_FROM']),
			html,
		});
	}

	/**
	 * Render a liquid template. Templates in EMAIL_TEMPLATES_PATH take precedence over the bundled ones.
	 * Output is HTML-escaped unless a value is piped through `raw`.
	 */
	async renderTemplate(template: string, variables: TemplateData): Promise<string> {
		const customTemplatePath = path.resolve(String(this.env['EMAIL_TEMPLATES_PATH']), `${template}.liquid`);
		const systemTemplatePath = path.join(SYSTEM_TEMPLATES_PATH, `${template}.liquid`);

		const templatePath = (await fse.pathExists(customTemplatePath)) ? customTemplatePath : systemTemplatePath;

		if ((await fse.pathExists(templatePath)) === false) {
			throw new InvalidPayloadError({ reason: `Template "${template}" doesn't exist` });
		}

		const templateString = await fse.readFile(templatePath, 'utf8');

		return getLiquidEngine().parseAndRender(templateString, variables);
	}
}
