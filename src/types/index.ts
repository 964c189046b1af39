export { isOutcomeKind, OutcomeKind, statusCodeFor } from './outcome.js';
