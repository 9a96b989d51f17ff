export { getTokenKind, listTokenKinds } from './kinds.js';
export type {
    ControlShape,
    TokenKind,
    SpinnerKind,
    RangeKind,
    ChoiceKind,
    StaticKind,
    TextKind,
} from './kinds.js';
