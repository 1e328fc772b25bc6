import { InvalidArgumentError, InvalidQueryError } from '../core/errors.js';
import type { Clause, Operator, Query, SortKey } from './query.types.js';

export type DialectName = 'dci' | 'jql' | 'drive';

interface Dialect {
    /** Characters a value may not carry without breaking the grammar. */
    forbidden: RegExp;
    forbiddenLabel: string;
    operators: Record<Exclude<Operator, 'in'>, (field: string, value: string) => string>;
    anyOf(field: string, values: string[]): string;
    allOf(terms: string[]): string;
    sort(keys: SortKey[]): string;
    /** Fields whose values are rendered bare instead of quoted. */
    booleanFields?: ReadonlySet<string>;
    /** Fields the upstream only searches with `like`. */
    likeOnlyFields?: ReadonlySet<string>;
    /** Dialects without a separate sort parameter fold the ordering into the filter. */
    embedSort?(filter: string, sort: string): string;
}

const dciFn = (name: string) => (field: string, value: string) => `${name}(${field},${value})`;
const jqlOp = (op: string) => (field: string, value: string) => `${field} ${op} "${value}"`;
const DRIVE_BOOLEAN_FIELDS: ReadonlySet<string> = new Set(['trashed', 'starred']);
// Drive compares booleans unquoted (`trashed = false`).
const driveLiteral = (field: string, value: string) => (DRIVE_BOOLEAN_FIELDS.has(field) ? value : `'${value}'`);
const driveOp = (op: string) => (field: string, value: string) => `${field} ${op} ${driveLiteral(field, value)}`;

const DIALECTS: Record<DialectName, Dialect> = {
    dci: {
        forbidden: /[(),]/,
        forbiddenLabel: '"(", ")" or ","',
        operators: {
            eq: dciFn('eq'),
            ne: (field, value) => `not(eq(${field},${value}))`,
            lt: dciFn('lt'),
            le: dciFn('le'),
            gt: dciFn('gt'),
            ge: dciFn('ge'),
            like: dciFn('like'),
        },
        anyOf: (field, values) => values.length === 1
            ? `eq(${field},${values[0]})`
            : `or(${values.map(v => `eq(${field},${v})`).join(',')})`,
        allOf: terms => terms.length === 1 ? terms[0] : `and(${terms.join(',')})`,
        sort: keys => keys.map(k => (k.direction === 'desc' ? `-${k.field}` : k.field)).join(','),
    },
    jql: {
        forbidden: /["\\\r\n]/,
        forbiddenLabel: 'double quotes, backslashes or line breaks',
        operators: {
            eq: jqlOp('='),
            ne: jqlOp('!='),
            lt: jqlOp('<'),
            le: jqlOp('<='),
            gt: jqlOp('>'),
            ge: jqlOp('>='),
            like: jqlOp('~'),
        },
        anyOf: (field, values) => `${field} in (${values.map(v => `"${v}"`).join(', ')})`,
        allOf: terms => terms.join(' AND '),
        sort: keys => keys.map(k => `${k.field} ${k.direction.toUpperCase()}`).join(', '),
        embedSort: (filter, sort) => (filter ? `${filter} ORDER BY ${sort}` : `ORDER BY ${sort}`),
    },
    drive: {
        forbidden: /['\\\r\n]/,
        forbiddenLabel: 'single quotes, backslashes or line breaks',
        operators: {
            eq: driveOp('='),
            ne: driveOp('!='),
            lt: driveOp('<'),
            le: driveOp('<='),
            gt: driveOp('>'),
            ge: driveOp('>='),
            like: driveOp('contains'),
        },
        anyOf: (field, values) => values.length === 1
            ? `${field} = ${driveLiteral(field, values[0])}`
            : `(${values.map(v => `${field} = ${driveLiteral(field, v)}`).join(' or ')})`,
        allOf: terms => terms.join(' and '),
        sort: keys => keys.map(k => (k.direction === 'desc' ? `${k.field} desc` : k.field)).join(','),
        booleanFields: DRIVE_BOOLEAN_FIELDS,
        likeOnlyFields: new Set(['fullText']),
    },
};

export interface TranslationTarget {
    dialect: DialectName;
    /** Fields the upstream resource accepts in filters and sorts. */
    fields: readonly string[];
    label: string;
}

export interface TranslatedListing {
    filter: string;
    /** Empty when there is no ordering or the dialect embeds it in the filter. */
    sort: string;
}

export class QueryTranslator {
    /**
     * Render a query in the target's dialect. Unknown fields and values the
     * grammar cannot quote raise InvalidQueryError; nothing is truncated.
     */
    translate(query: Query, target: TranslationTarget): string {
        const dialect = DIALECTS[target.dialect];
        const terms = query.map(clause => this.translateClause(clause, target, dialect));
        return terms.length === 0 ? '' : dialect.allOf(terms);
    }

    translateSort(sort: SortKey[], target: TranslationTarget): string {
        for (const key of sort) {
            if (!target.fields.includes(key.field)) {
                throw new InvalidArgumentError(`Unknown sort field "${key.field}" for ${target.label}; allowed: ${target.fields.join(', ')}`);
            }
        }
        return sort.length === 0 ? '' : DIALECTS[target.dialect].sort(sort);
    }

    translateListing(query: Query, sort: SortKey[], target: TranslationTarget): TranslatedListing {
        const filter = this.translate(query, target);
        const renderedSort = this.translateSort(sort, target);
        const dialect = DIALECTS[target.dialect];
        if (renderedSort && dialect.embedSort) {
            return { filter: dialect.embedSort(filter, renderedSort), sort: '' };
        }
        return { filter, sort: renderedSort };
    }

    private translateClause(clause: Clause, target: TranslationTarget, dialect: Dialect): string {
        if (!target.fields.includes(clause.field)) {
            throw new InvalidQueryError(`Unknown field "${clause.field}" for ${target.label}; allowed: ${target.fields.join(', ')}`);
        }

        if (clause.operator !== 'like' && dialect.likeOnlyFields?.has(clause.field)) {
            throw new InvalidQueryError(`"${clause.field}" for ${target.label} only supports the like operator`);
        }

        const values = clause.operator === 'in' ? clause.value : [clause.value];
        for (const value of values) {
            if (dialect.forbidden.test(value)) {
                throw new InvalidQueryError(`Value "${value}" for "${clause.field}" cannot contain ${dialect.forbiddenLabel}`);
            }
            if (dialect.booleanFields?.has(clause.field) && value !== 'true' && value !== 'false') {
                throw new InvalidQueryError(`"${clause.field}" for ${target.label} takes true or false, got "${value}"`);
            }
        }

        if (clause.operator === 'in') {
            if (clause.value.length === 0) {
                throw new InvalidQueryError(`"in" on "${clause.field}" needs at least one value`);
            }
            return dialect.anyOf(clause.field, clause.value);
        }
        return dialect.operators[clause.operator](clause.field, clause.value);
    }
}
