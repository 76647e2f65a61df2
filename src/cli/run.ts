#!/usr/bin/env node
import { createCli } from './index.js';

createCli()
	.then((program) => program.parseAsync(process.argv))
	.catch((err: unknown) => {
		process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
		process.exit(1);
	});
