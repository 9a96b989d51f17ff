export { createFilenameValidator, validateFilename } from './validate-filename.js';
export type { FilenameValidator } from './validate-filename.js';
export { suggestFilename } from './suggest.js';
