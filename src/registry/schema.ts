/**
 * Specstance — Position record schema.
 *
 * The member table drives diagnostic wording; the zod schema does the
 * checking. Keep the two in step when adding a member.
 */

import { z } from 'zod';
import { MOZ_POSITIONS, ORGS } from '../types/index.js';

export type MemberKind =
  | { type: 'string' }
  | { type: 'url' }
  | { type: 'integer' }
  | { type: 'enum'; values: readonly string[] };

export interface MemberSpec {
  name: string;
  required: boolean;
  kind: MemberKind;
}

export const RECORD_MEMBERS: readonly MemberSpec[] = [
  { name: 'title',             required: true,  kind: { type: 'string' } },
  { name: 'description',       required: true,  kind: { type: 'string' } },
  { name: 'ciuName',           required: false, kind: { type: 'string' } },
  { name: 'org',               required: true,  kind: { type: 'enum', values: ORGS } },
  { name: 'group',             required: false, kind: { type: 'string' } },
  { name: 'url',               required: true,  kind: { type: 'url' } },
  { name: 'mozBugUrl',         required: false, kind: { type: 'url' } },
  { name: 'mozPositionIssue',  required: false, kind: { type: 'integer' } },
  { name: 'mozPosition',       required: true,  kind: { type: 'enum', values: MOZ_POSITIONS } },
  { name: 'mozPositionDetail', required: false, kind: { type: 'string' } },
];

const urlString = z.string().url();

export const positionRecordSchema = z.object({
  title: z.string(),
  description: z.string(),
  ciuName: z.string().nullish(),
  org: z.enum(ORGS),
  group: z.string().nullish(),
  url: urlString,
  mozBugUrl: urlString.nullish(),
  mozPositionIssue: z.number().int().nonnegative().nullish(),
  mozPosition: z.enum(MOZ_POSITIONS),
  mozPositionDetail: z.string().nullish(),
}).strict();

export function memberSpec(name: string): MemberSpec | undefined {
  return RECORD_MEMBERS.find(m => m.name === name);
}
