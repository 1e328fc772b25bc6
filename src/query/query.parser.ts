import { InvalidArgumentError, InvalidQueryError } from '../core/errors.js';
import { OPERATORS } from './query.types.js';
import type { Clause, Operator, Query, SortKey } from './query.types.js';

function isOperator(value: string): value is Operator {
    return OPERATORS.some(op => op === value);
}

function parseClause(raw: string): Clause {
    const first = raw.indexOf(':');
    const second = first === -1 ? -1 : raw.indexOf(':', first + 1);
    if (first === -1 || second === -1) {
        throw new InvalidQueryError(`Malformed clause "${raw}": expected field:operator:value`);
    }

    const field = raw.slice(0, first).trim();
    const operator = raw.slice(first + 1, second).trim().toLowerCase();
    const value = raw.slice(second + 1);

    if (!field) {
        throw new InvalidQueryError(`Malformed clause "${raw}": field is empty`);
    }
    if (!isOperator(operator)) {
        throw new InvalidQueryError(`Unknown operator "${operator}" in clause "${raw}"; expected one of ${OPERATORS.join(', ')}`);
    }
    if (value.length === 0) {
        throw new InvalidQueryError(`Malformed clause "${raw}": value is empty`);
    }

    if (operator === 'in') {
        const members = value.split('|');
        if (members.some(m => m.length === 0)) {
            throw new InvalidQueryError(`Malformed clause "${raw}": "in" members must be non-empty`);
        }
        return { field, operator, value: members };
    }
    return { field, operator, value };
}

/**
 * Parse `field:op:value[,field:op:value...]`. The value is everything after
 * the second colon, so timestamps keep their own colons. `in` takes
 * `a|b|c`. A blank string is the empty query.
 */
export function parseQuery(input: string | undefined): Query {
    if (input === undefined || input.trim() === '') {
        return [];
    }
    return input.split(',').map(part => part.trim()).map(part => {
        if (!part) {
            throw new InvalidQueryError(`Malformed query "${input}": empty clause`);
        }
        return parseClause(part);
    });
}

/** Parse `field[:asc|desc][,field[:asc|desc]...]`. */
export function parseSort(input: string | undefined): SortKey[] {
    if (input === undefined || input.trim() === '') {
        return [];
    }
    return input.split(',').map(part => {
        const [rawField = '', rawDirection, ...extra] = part.trim().split(':');
        const field = rawField.trim();
        const direction = (rawDirection ?? 'asc').trim().toLowerCase();
        if (!field || extra.length > 0) {
            throw new InvalidArgumentError(`Malformed sort "${part.trim()}": expected field[:asc|desc]`);
        }
        if (direction !== 'asc' && direction !== 'desc') {
            throw new InvalidArgumentError(`Unknown sort direction "${direction}" for "${field}"`);
        }
        return { field, direction };
    });
}
