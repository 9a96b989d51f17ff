export { fastMatch, matchesTemplate, checkVersionPadding } from './fast-match.js';
export { diagnose, diagnoseEntries } from './diagnose.js';
export { previewOf } from './messages.js';
