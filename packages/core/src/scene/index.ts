export { checkSceneNodes, fileBasename } from './check.js';
