/**
 * Thrown when a processor descriptor cannot be turned into something invokable.
 */
export class InvalidProcessorError extends Error {
    public readonly name = 'InvalidProcessorError';

    constructor(
        message: string,
        public readonly processor: string
    ) {
        super(message);
        Object.setPrototypeOf(this, InvalidProcessorError.prototype);
    }

    static fromNamedProcessor(name: string): InvalidProcessorError {
        return new InvalidProcessorError(
            `Cannot resolve processor "${name}": no processor factory is registered under that name`,
            name
        );
    }

    static fromUnsupportedType(type: string): InvalidProcessorError {
        return new InvalidProcessorError(
            `Cannot use processor of type ${type}: it must be a function or expose a process() method`,
            type
        );
    }
}
