export { compileTemplate, compileOverride, buildEntryPiece } from './compile.js';
export type { CompiledPattern, CompiledOverride, EntryPiece } from './compile.js';
export { CompileError, PatternError } from './errors.js';
