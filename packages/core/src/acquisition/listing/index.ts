import type { AutomaticSource } from '../../catalog/types.js';
import { DirectUrlLister } from './direct-lister.js';
import { RecursiveApiLister } from './recursive-lister.js';
import { TreeApiLister } from './tree-lister.js';
import type { ListerOptions, RemoteFileLister } from './types.js';

export type { RemoteFile, RemoteFileLister, ListRequest, ListerOptions } from './types.js';
export { TreeApiLister } from './tree-lister.js';
export { RecursiveApiLister } from './recursive-lister.js';
export { DirectUrlLister } from './direct-lister.js';
export { finalizeListing, isHiddenPath } from './filters.js';

/**
 * Pick the listing backend for a source kind
 */
export function createLister(kind: AutomaticSource['kind'], options: ListerOptions): RemoteFileLister {
    switch (kind) {
        case 'remote-tree-api':
            return new TreeApiLister(options);
        case 'remote-recursive-api':
            return new RecursiveApiLister(options);
        case 'direct-url':
            return new DirectUrlLister();
    }
}
