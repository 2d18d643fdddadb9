/**
 * Error thrown when an argument handed to the aggregator is invalid.
 */
export class ArgumentError extends Error {
    public readonly name = 'ArgumentError';

    constructor(
        public readonly argument: string,
        message: string
    ) {
        super(message);
        Object.setPrototypeOf(this, ArgumentError.prototype);
    }
}
