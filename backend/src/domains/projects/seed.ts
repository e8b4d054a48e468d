/**
 * Seed data for the in-memory domain store, validated with zod.
 *
 * @module domains/projects/seed
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { TASK_STATUSES, TASK_PRIORITIES, USER_ROLES, PROJECT_ROLES } from '@taskpilot/shared';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const userSchema = z.object({
  id: z.number().int().positive(),
  email: z.string().email(),
  fullName: z.string().nullable().default(null),
  username: z.string(),
  role: z.enum(USER_ROLES).default('member'),
});

const projectSchema = z.object({
  id: z.number().int().positive(),
  key: z.string().nullable().default(null),
  name: z.string(),
  description: z.string().nullable().default(null),
  creatorId: z.number().int().positive(),
});

const memberSchema = z.object({
  projectId: z.number().int().positive(),
  userId: z.number().int().positive(),
  role: z.enum(PROJECT_ROLES).default('member'),
});

const epicSchema = z.object({
  id: z.number().int().positive(),
  projectId: z.number().int().positive(),
  title: z.string(),
  description: z.string().nullable().default(null),
  color: z.string().nullable().default(null),
  startDate: isoDate.nullable().default(null),
  endDate: isoDate.nullable().default(null),
});

const sprintSchema = z.object({
  id: z.number().int().positive(),
  projectId: z.number().int().positive(),
  name: z.string(),
  startDate: isoDate.nullable().default(null),
  endDate: isoDate.nullable().default(null),
  isActive: z.boolean().default(false),
});

const taskSchema = z.object({
  id: z.number().int().positive(),
  projectId: z.number().int().positive(),
  epicId: z.number().int().positive().nullable().default(null),
  sprintId: z.number().int().positive().nullable().default(null),
  parentId: z.number().int().positive().nullable().default(null),
  title: z.string(),
  description: z.string().nullable().default(null),
  status: z.enum(TASK_STATUSES).default('todo'),
  priority: z.enum(TASK_PRIORITIES).default('medium'),
  estimate: z.number().nullable().default(null),
  remaining: z.number().nullable().default(null),
  dueDate: isoDate.nullable().default(null),
  reporterId: z.number().int().positive().nullable().default(null),
  orderIndex: z.number().int().default(0),
  assigneeIds: z.array(z.number().int().positive()).default([]),
});

export const domainSeedSchema = z.object({
  users: z.array(userSchema).default([]),
  projects: z.array(projectSchema).default([]),
  members: z.array(memberSchema).default([]),
  epics: z.array(epicSchema).default([]),
  sprints: z.array(sprintSchema).default([]),
  tasks: z.array(taskSchema).default([]),
});

/** Parsed seed: every collection present, every optional field defaulted. */
export type DomainSeed = z.output<typeof domainSeedSchema>;

/** Seed as written in JSON or in tests: collections and defaulted fields may be omitted. */
export type DomainSeedInput = z.input<typeof domainSeedSchema>;

export function parseDomainSeed(input: unknown): DomainSeed {
  return domainSeedSchema.parse(input);
}

export async function loadDomainSeed(path: string): Promise<DomainSeed> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return parseDomainSeed(raw);
}
