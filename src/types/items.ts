export type PrimaryKey = number;

export type Item = Record<string, unknown>;

export type Query = {
	skip?: number;
	limit?: number;
	filter?: Record<string, string | number | boolean>;
};
