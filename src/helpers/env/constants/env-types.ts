export const ENV_TYPES = ['string', 'number', 'boolean', 'regex', 'array', 'json'] as const;

export type EnvType = (typeof ENV_TYPES)[number];
