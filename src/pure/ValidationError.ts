import {NonEmptyList} from 'purify-ts';

export class ValidationError extends Error {
    readonly errors: NonEmptyList<string>;

    constructor(errors: NonEmptyList<string>) {
        super(errors.join('; '));
        this.name = 'ValidationError';
        this.errors = errors;
    }

    /**
     * The validation messages of a ValidationError; anything else is rethrown.
     */
    static messagesOf(error: Error): NonEmptyList<string> {
        if (error instanceof ValidationError) return error.errors;
        throw error;
    }
}
