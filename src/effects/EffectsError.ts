import {DomainError} from '../pure/types';

export class EffectsError extends Error {
    readonly errors: Error[];

    constructor(errors: Error[]) {
        super(errors.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.errors = errors;
    }
}

/**
 * Stored discount data that fails validation. Loading stops rather than
 * pricing with a corrected value.
 */
export class DiscountDataError extends Error {
    readonly errors: DomainError[];

    constructor(errors: DomainError[]) {
        super(errors.map(e => e.message).join('; '));
        this.name = 'DiscountDataError';
        this.errors = errors;
    }
}
