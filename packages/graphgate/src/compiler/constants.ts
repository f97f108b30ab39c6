export const PAGINATION_LIMIT_ARGS = new Set(["first", "last"]);

export const COST_SCALE = 100;

export const MIN_COST = 1;
