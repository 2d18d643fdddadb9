import { resolveProcessor, type Registry } from '../resolve';
import type { ConfigMap, Logger } from '../types';

/**
 * Passes the configuration through each processor in turn; every processor
 * receives what the previous one returned. Output is not validated and
 * processor errors propagate unchanged.
 */
export const postProcess = (
    processors: readonly unknown[],
    config: ConfigMap,
    registry: Registry | undefined,
    logger: Logger
): ConfigMap => {
    let processed = config;
    for (const descriptor of processors) {
        const processor = resolveProcessor(descriptor, registry);
        logger.debug(`Applying config processor: ${processor.name}`);
        processed = processor.process(processed);
    }
    return processed;
};
