import { createEnv, type Env } from './lib/create-env.js';

export type { Env } from './lib/create-env.js';

let _env: Env | null = null;

export const useEnv = (): Env => {
	if (_env) return _env;

	_env = createEnv();

	return _env;
};
