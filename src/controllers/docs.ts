import { Router } from 'express';
import fse from 'fs-extra';
import yaml from 'js-yaml';
import { fileURLToPath } from 'node:url';
import asyncHandler from '../helpers/utils/async-handler.js';
import { isObject } from '../helpers/utils/is-object.js';

export const OPENAPI_PATH = fileURLToPath(new URL('../openapi/openapi.yaml', import.meta.url));

let document: Record<string, unknown> | null = null;

export async function getOpenApiDocument(): Promise<Record<string, unknown>> {
	if (document) return document;

	const parsed: unknown = yaml.load(await fse.readFile(OPENAPI_PATH, 'utf8'));

	if (!isObject(parsed)) {
		throw new Error(`${OPENAPI_PATH} does not contain an OpenAPI document`);
	}

	document = parsed;

	return document;
}

const page = (title: string, body: string) => `<!DOCTYPE html>
<html lang="en">
	<head>
		<meta charset="utf-8" />
		<meta name="viewport" content="width=device-width, initial-scale=1" />
		<title>${title}</title>
	</head>
	<body>
${body}
	</body>
</html>
`;

const swaggerPage = page(
	'Alma Item Checks API',
	`		<link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css" />
		<div id="swagger-ui"></div>
		<script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js" crossorigin></script>
		<script>
			window.onload = () => {
				window.ui = SwaggerUIBundle({ url: './openapi.json', dom_id: '#swagger-ui' });
			};
		</script>`,
);

const redocPage = page(
	'Alma Item Checks API',
	`		<redoc spec-url="./openapi.json"></redoc>
		<script src="https://cdn.redoc.ly/redoc/latest/bundles/redoc.standalone.js"></script>`,
);

const router = Router();

router.get(
	'/openapi.json',
	asyncHandler(async (_req, res) => {
		res.json(await getOpenApiDocument());
	}),
);

router.get('/docs', (_req, res) => {
	res.type('html').send(swaggerPage);
});

router.get('/redoc', (_req, res) => {
	res.type('html').send(redocPage);
});

export default router;
