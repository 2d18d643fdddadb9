/**
 * Thrown when a provider descriptor cannot be turned into something invokable:
 * the name is not registered, or the value (or what its factory built) is
 * neither a function nor an object with a `provide()` method.
 */
export class InvalidProviderError extends Error {
    public readonly name = 'InvalidProviderError';

    constructor(
        message: string,
        public readonly provider: string
    ) {
        super(message);
        Object.setPrototypeOf(this, InvalidProviderError.prototype);
    }

    static fromNamedProvider(name: string): InvalidProviderError {
        return new InvalidProviderError(
            `Cannot resolve provider "${name}": no provider factory is registered under that name`,
            name
        );
    }

    static fromUnsupportedType(type: string): InvalidProviderError {
        return new InvalidProviderError(
            `Cannot use provider of type ${type}: it must be a function or expose a provide() method`,
            type
        );
    }
}
