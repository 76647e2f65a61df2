export type User = {
	id: number;
	email: string;
	is_active: boolean;
	created_at: Date;
	updated_at: Date;
};

export type Subscription = {
	id: number;
	user_id: number;
	check_id: number;
	created_at: Date;
};
