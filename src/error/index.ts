export { ArgumentError } from './ArgumentError';
export { FileSystemError, type FileSystemErrorType } from './FileSystemError';
export { InvalidProcessorError } from './InvalidProcessorError';
export { InvalidProviderError } from './InvalidProviderError';
export { ProviderReturnedInvalidConfigError } from './ProviderReturnedInvalidConfigError';
