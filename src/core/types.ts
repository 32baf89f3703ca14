/**
 * Core types for the taskboard API
 * Entity records and request payloads, each defined once as a Zod schema
 */

import { z } from 'zod';

// ============================================================
// Enumerations
// ============================================================

export const TaskStatusSchema = z.enum([
  'to-do',
  'in-progress',
  'await-feedback',
  'done'
]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TASK_STATUSES = TaskStatusSchema.options;

export const TaskPrioritySchema = z.enum(['low', 'medium', 'urgent']);
export type TaskPriority = z.infer<typeof TaskPrioritySchema>;

export const TaskCategorySchema = z.enum(['technical-task', 'user-story']);
export type TaskCategory = z.infer<typeof TaskCategorySchema>;

export const DEFAULT_TASK_ICON = '/static/default.svg';
export const DEFAULT_CONTACT_COLOR = '#000000';

// ============================================================
// Shared field schemas
// ============================================================

const IdSchema = z.number().int().positive();

/** Calendar date in YYYY-MM-DD form that also names a real day. */
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Date has wrong format. Use YYYY-MM-DD.')
  .refine((value) => {
    // format errors are reported by the regex alone
    if (!ISO_DATE_PATTERN.test(value)) return true;
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Date is not a valid calendar day.');

const ColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Color must look like #rrggbb.');

// ============================================================
// Contact
// ============================================================

export const ContactSchema = z.object({
  id: IdSchema,
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  color: z.string()
});
export type Contact = z.infer<typeof ContactSchema>;

export const ContactInputSchema = z.object({
  name: z.string().trim().min(1).max(255),
  email: z.string().trim().email().max(254),
  phone: z.string().trim().min(1).max(20),
  color: ColorSchema.default(DEFAULT_CONTACT_COLOR)
});
export type ContactInput = z.infer<typeof ContactInputSchema>;

export const ContactPatchSchema = ContactInputSchema.partial();
export type ContactPatch = z.infer<typeof ContactPatchSchema>;

// ============================================================
// Subtask
// ============================================================

export const SubtaskSchema = z.object({
  id: IdSchema,
  task: IdSchema,
  title: z.string(),
  completed: z.boolean()
});
export type Subtask = z.infer<typeof SubtaskSchema>;

export const SubtaskInputSchema = z.object({
  task: IdSchema,
  title: z.string().trim().min(1).max(255),
  completed: z.boolean().default(false)
});

export const SubtaskPatchSchema = SubtaskInputSchema.partial();

// ============================================================
// Task
// ============================================================

export const TaskSchema = z.object({
  id: IdSchema,
  title: z.string(),
  description: z.string().nullable(),
  due_date: z.string(),
  priority: TaskPrioritySchema,
  status: TaskStatusSchema,
  board_category: TaskStatusSchema,
  task_category: TaskCategorySchema.nullable(),
  icon: z.string().nullable(),
  contact_ids: z.array(IdSchema),
  contacts: z.array(ContactSchema),
  subtasks: z.array(SubtaskSchema)
});
export type Task = z.infer<typeof TaskSchema>;

/** Flat task row as stored, without relations. */
export const TaskRowSchema = TaskSchema.omit({
  contact_ids: true,
  contacts: true,
  subtasks: true
});
export type TaskRow = z.infer<typeof TaskRowSchema>;

const taskFields = {
  title: z.string().trim().min(1).max(255),
  description: z.string().nullable().optional(),
  due_date: IsoDateSchema,
  priority: TaskPrioritySchema,
  status: TaskStatusSchema.optional(),
  board_category: TaskStatusSchema.optional(),
  task_category: TaskCategorySchema.nullable().optional(),
  icon: z.string().max(255).nullable().optional()
};

function statusAliasesAgree(value: { status?: TaskStatus; board_category?: TaskStatus }): boolean {
  return value.status === undefined
    || value.board_category === undefined
    || value.status === value.board_category;
}

const statusMismatch = {
  message: 'status and board_category must match when both are given.',
  path: ['board_category']
};

export const TaskInputSchema = z.object(taskFields).refine(statusAliasesAgree, statusMismatch);

export const TaskPatchSchema = z.object(taskFields).partial().refine(statusAliasesAgree, statusMismatch);
export type TaskPatch = z.infer<typeof TaskPatchSchema>;

// ============================================================
// Board
// ============================================================

export const BoardSchema = z.object({
  id: IdSchema,
  name: z.string()
});
export type Board = z.infer<typeof BoardSchema>;

export const BoardInputSchema = z.object({
  name: z.string().trim().min(1).max(255)
});

// ============================================================
// Summary
// ============================================================

export const TaskSummarySchema = z.object({
  'to-do': z.number().int(),
  'in-progress': z.number().int(),
  'await-feedback': z.number().int(),
  done: z.number().int(),
  'total-tasks': z.number().int(),
  urgent: z.number().int(),
  'completed-percentage': z.number()
});
export type TaskSummary = z.infer<typeof TaskSummarySchema>;

// ============================================================
// Users & Authentication
// ============================================================

export interface User {
  id: number;
  email: string;
  username: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  isStaff: boolean;
  isSuperuser: boolean;
  dateJoined: Date;
}

/** The authenticated principal attached to a request. */
export type AuthUser = Pick<User, 'id' | 'email' | 'username' | 'isStaff' | 'isSuperuser'>;

export const RegistrationInputSchema = z
  .object({
    email: z.string().trim().toLowerCase().email().max(254),
    username: z.string().trim().min(1).max(150).regex(/^[\w.@+-]+$/, 'Username may contain only letters, digits and @/./+/-/_.'),
    password: z.string().min(8, 'Password must be at least 8 characters.').max(128),
    repeated_password: z.string()
  })
  .refine((value) => value.password === value.repeated_password, {
    message: 'Passwords do not match',
    path: ['password']
  });

export const LoginInputSchema = z.object({
  email: z.string().trim().toLowerCase(),
  password: z.string()
});

export const AuthResultSchema = z.object({
  token: z.string(),
  user_id: IdSchema,
  email: z.string(),
  username: z.string()
});
export type AuthResult = z.infer<typeof AuthResultSchema>;

export const ProfileSchema = z.object({
  email: z.string(),
  username: z.string(),
  bio: z.string().nullable(),
  location: z.string().nullable()
});
export type Profile = z.infer<typeof ProfileSchema>;

export const ProfilePatchSchema = z.object({
  bio: z.string().max(2000).nullable().optional(),
  location: z.string().max(100).nullable().optional()
});

export const PasswordChangeInputSchema = z.object({
  current_password: z.string(),
  new_password: z.string().min(8, 'Password must be at least 8 characters.').max(128)
});
