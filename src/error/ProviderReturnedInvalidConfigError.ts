/**
 * Thrown when a provider returns, or yields, something other than a
 * configuration map. Nothing from the offending value is merged.
 */
export class ProviderReturnedInvalidConfigError extends Error {
    public readonly name = 'ProviderReturnedInvalidConfigError';

    constructor(
        public readonly provider: string,
        public readonly receivedType: string
    ) {
        super(`Cannot read config from ${provider}; it returned ${receivedType} instead of a configuration map`);
        Object.setPrototypeOf(this, ProviderReturnedInvalidConfigError.prototype);
    }
}
