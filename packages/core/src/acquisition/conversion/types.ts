import type { Logger } from '../../logger/types.js';

export interface ConversionContext {
    modelId: string;
    /** Fully downloaded files, laid out as listed */
    stagingDir: string;
    /** Final storage location; created by the caller */
    destinationDir: string;
    options: Record<string, unknown>;
    logger: Logger;
}

/**
 * Post-download transform from the host's layout to the runtime's layout
 */
export interface ModelConverter {
    readonly name: string;
    convert(context: ConversionContext): Promise<void>;
}
