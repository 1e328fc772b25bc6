export const OPERATORS = ['eq', 'ne', 'lt', 'le', 'gt', 'ge', 'like', 'in'] as const;

export type Operator = typeof OPERATORS[number];

export type Clause =
    | { field: string; operator: Exclude<Operator, 'in'>; value: string }
    | { field: string; operator: 'in'; value: string[] };

/** Clauses are combined with an implicit AND. */
export type Query = Clause[];

export type SortDirection = 'asc' | 'desc';

export interface SortKey {
    field: string;
    direction: SortDirection;
}

export interface PageRequest {
    limit: number;
    offset: number;
    sort: SortKey[];
}
