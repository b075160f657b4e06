// ============================================================================
// Context Module — Barrel export
// ============================================================================

export { SubmissionContext } from './submission-context.js';
export type { ContextConflict } from './submission-context.js';
export { buildContext } from './context-builder.js';
export type { BuildContextOptions } from './context-builder.js';
export { addYears, addMonths, addDays, wholeYearsBetween, parseIsoDate, toIsoDate } from './calendar.js';
