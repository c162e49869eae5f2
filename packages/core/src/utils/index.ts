export { formatSize } from './format.js';
export { isErrnoException, isNotFound, pathExists } from './fs.js';
