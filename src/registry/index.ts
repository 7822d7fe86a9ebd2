/**
 * Specstance Registry — Public API
 */

export { ActivitiesFile, formatJson, sortKeys, JSON_INDENT } from './activities.js';
export { validateEntry, validateRegistry, parseRecord, isPlainObject } from './validate.js';
export { positionRecordSchema, RECORD_MEMBERS, memberSpec } from './schema.js';
export type { MemberSpec, MemberKind } from './schema.js';
export { summarize } from './summary.js';
