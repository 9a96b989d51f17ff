export { escapeRegExp, caselessLiteral, alternation, tryCompile } from './regex.js';
export { normalizeConfiguredValue } from './normalize.js';
export { fingerprintTemplate } from './fingerprint.js';
