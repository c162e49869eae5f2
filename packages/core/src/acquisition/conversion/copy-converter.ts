import { promises as fs } from 'fs';
import type { ConversionContext, ModelConverter } from './types.js';

/**
 * Identity conversion: staged files are copied into place unchanged
 */
export class CopyConverter implements ModelConverter {
    readonly name = 'copy';

    async convert({ stagingDir, destinationDir }: ConversionContext): Promise<void> {
        await fs.cp(stagingDir, destinationDir, { recursive: true, force: true });
    }
}
