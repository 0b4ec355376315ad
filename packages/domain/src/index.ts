// Domain types and schemas
export * from './types.js';

// Domain errors
export * from './errors.js';

// Escalation ladder
export * from './escalation.js';

// Profile predicates (ownership, parties, consistency checks)
export * from './predicates.js';

// Branch evaluators (non-owner / owner)
export * from './branch.js';

// General rule pass
export * from './general-rules.js';

// Risk factor reporter
export * from './risk-factors.js';

// Full assessment pipeline
export * from './assessment.js';
