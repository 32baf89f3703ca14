/**
 * Taskboard Service
 * Entry point for the HTTP layer and the CLI. Validates payloads, runs each
 * write in one transaction and shapes rows into API records.
 */

import type { TypeOf, ZodTypeAny } from 'zod';
import { TaskboardStore } from '../core/taskboard-store.js';
import { TaskRepo, type TaskFields } from '../core/repos/task-repo.js';
import { SubtaskRepo } from '../core/repos/subtask-repo.js';
import { ContactRepo } from '../core/repos/contact-repo.js';
import { BoardRepo } from '../core/repos/board-repo.js';
import { UserRepo } from '../core/repos/user-repo.js';
import { AssignmentReconciler, extractAssignmentRequest } from '../core/assignment-reconciler.js';
import { SummaryAggregator } from '../core/summary-aggregator.js';
import { hashPassword, verifyPassword } from '../core/auth/index.js';
import {
  InvalidCredentialsError,
  NotFoundError,
  ValidationError,
  fromZodError
} from '../core/errors.js';
import {
  BoardInputSchema,
  ContactInputSchema,
  ContactPatchSchema,
  DEFAULT_TASK_ICON,
  LoginInputSchema,
  PasswordChangeInputSchema,
  ProfilePatchSchema,
  RegistrationInputSchema,
  SubtaskInputSchema,
  SubtaskPatchSchema,
  TaskInputSchema,
  TaskPatchSchema,
  type AuthResult,
  type AuthUser,
  type Board,
  type Contact,
  type Profile,
  type Subtask,
  type Task,
  type TaskPatch,
  type TaskRow,
  type TaskSummary,
  type User
} from '../core/types.js';

export interface TaskboardServiceConfig {
  /** SQLite file path, or ":memory:". */
  dbPath: string;
}

export interface TaskFilter {
  /** Matches the task's status (board category) column exactly. */
  status?: string;
}

export interface CreateUserOptions {
  email: string;
  username: string;
  password: string;
  isStaff?: boolean;
  isSuperuser?: boolean;
}

function parseInput<S extends ZodTypeAny>(schema: S, payload: unknown): TypeOf<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
}

function invalidPk(id: number): string {
  return `Invalid pk "${id}" - object does not exist.`;
}

export class TaskboardService {
  private readonly store: TaskboardStore;
  private readonly tasks: TaskRepo;
  private readonly subtasks: SubtaskRepo;
  private readonly contacts: ContactRepo;
  private readonly boards: BoardRepo;
  private readonly users: UserRepo;
  private readonly reconciler: AssignmentReconciler;
  private readonly aggregator: SummaryAggregator;
  private initialized = false;

  constructor(config: TaskboardServiceConfig) {
    this.store = new TaskboardStore(config.dbPath);
    this.tasks = new TaskRepo(this.store.db);
    this.subtasks = new SubtaskRepo(this.store.db);
    this.contacts = new ContactRepo(this.store.db);
    this.boards = new BoardRepo(this.store.db);
    this.users = new UserRepo(this.store.db);
    this.reconciler = new AssignmentReconciler(this.tasks, this.contacts, this.subtasks);
    this.aggregator = new SummaryAggregator(this.tasks);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.store.initialize();
    this.initialized = true;
  }

  async shutdown(): Promise<void> {
    this.store.close();
    this.initialized = false;
  }

  // ============================================================
  // Tasks
  // ============================================================

  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    await this.initialize();
    return this.tasks.list(filter.status).map(row => this.toTask(row));
  }

  async getTask(id: number): Promise<Task> {
    await this.initialize();
    const row = this.tasks.get(id);
    if (!row) throw new NotFoundError();
    return this.toTask(row);
  }

  /**
   * Create a task and apply its contact ids and `subtasks` in one transaction.
   */
  async createTask(payload: unknown): Promise<Task> {
    await this.initialize();
    const input = parseInput(TaskInputSchema, payload);

    const row = this.store.transaction(() => {
      const created = this.tasks.create({
        title: input.title,
        description: input.description ?? null,
        due_date: input.due_date,
        priority: input.priority,
        status: input.status ?? input.board_category ?? 'to-do',
        task_category: input.task_category ?? null,
        icon: input.icon === undefined ? DEFAULT_TASK_ICON : input.icon
      });
      this.reconciler.apply(created.id, extractAssignmentRequest(payload), 'create');
      return created;
    });

    return this.toTask(row);
  }

  /**
   * Update a task. `partial` selects PATCH semantics; with PUT the required
   * fields must be present. Omitted optional fields keep their value either way.
   */
  async updateTask(id: number, payload: unknown, partial: boolean): Promise<Task> {
    await this.initialize();
    const existing = this.tasks.get(id);
    if (!existing) throw new NotFoundError();

    const input: TaskPatch = partial
      ? parseInput(TaskPatchSchema, payload)
      : parseInput(TaskInputSchema, payload);

    const fields: TaskFields = {
      title: input.title ?? existing.title,
      description: input.description !== undefined ? input.description : existing.description,
      due_date: input.due_date ?? existing.due_date,
      priority: input.priority ?? existing.priority,
      status: input.status ?? input.board_category ?? existing.status,
      task_category: input.task_category !== undefined ? input.task_category : existing.task_category,
      icon: input.icon !== undefined ? input.icon : existing.icon
    };

    const row = this.store.transaction(() => {
      const updated = this.tasks.update(id, fields);
      this.reconciler.apply(id, extractAssignmentRequest(payload), 'update');
      return updated;
    });

    return this.toTask(row);
  }

  /**
   * Delete a task; its subtasks and contact links cascade.
   */
  async deleteTask(id: number): Promise<void> {
    await this.initialize();
    if (!this.tasks.delete(id)) throw new NotFoundError();
  }

  /** Every task as a flat row, for board rendering. */
  async getBoardOverview(): Promise<TaskRow[]> {
    await this.initialize();
    return this.tasks.list();
  }

  async getSummary(): Promise<TaskSummary> {
    await this.initialize();
    return this.aggregator.summarize();
  }

  async countTasks(): Promise<number> {
    await this.initialize();
    return this.tasks.count();
  }

  // ============================================================
  // Subtasks
  // ============================================================

  async listSubtasks(taskId?: number): Promise<Subtask[]> {
    await this.initialize();
    return taskId === undefined ? this.subtasks.list() : this.subtasks.listForTask(taskId);
  }

  async getSubtask(id: number): Promise<Subtask> {
    await this.initialize();
    const subtask = this.subtasks.get(id);
    if (!subtask) throw new NotFoundError();
    return subtask;
  }

  async createSubtask(payload: unknown): Promise<Subtask> {
    await this.initialize();
    const input = parseInput(SubtaskInputSchema, payload);
    this.assertTaskExists(input.task);
    return this.subtasks.create(input.task, { title: input.title, completed: input.completed });
  }

  async updateSubtask(id: number, payload: unknown, partial: boolean): Promise<Subtask> {
    await this.initialize();
    if (!this.subtasks.get(id)) throw new NotFoundError();

    const input = partial
      ? parseInput(SubtaskPatchSchema, payload)
      : parseInput(SubtaskInputSchema, payload);
    if (input.task !== undefined) this.assertTaskExists(input.task);

    const updated = this.subtasks.update(id, input);
    if (!updated) throw new NotFoundError();
    return updated;
  }

  async deleteSubtask(id: number): Promise<void> {
    await this.initialize();
    if (!this.subtasks.delete(id)) throw new NotFoundError();
  }

  // ============================================================
  // Contacts
  // ============================================================

  async listContacts(): Promise<Contact[]> {
    await this.initialize();
    return this.contacts.list();
  }

  async getContact(id: number): Promise<Contact> {
    await this.initialize();
    const contact = this.contacts.get(id);
    if (!contact) throw new NotFoundError();
    return contact;
  }

  async createContact(payload: unknown): Promise<Contact> {
    await this.initialize();
    const input = parseInput(ContactInputSchema, payload);
    this.assertContactEmailFree(input.email);
    return this.contacts.create(input);
  }

  async updateContact(id: number, payload: unknown, partial: boolean): Promise<Contact> {
    await this.initialize();
    if (!this.contacts.get(id)) throw new NotFoundError();

    const input = partial
      ? parseInput(ContactPatchSchema, payload)
      : parseInput(ContactInputSchema, payload);
    if (input.email !== undefined) this.assertContactEmailFree(input.email, id);

    const updated = this.contacts.update(id, input);
    if (!updated) throw new NotFoundError();
    return updated;
  }

  /**
   * Delete a contact. Tasks it was assigned to keep existing.
   */
  async deleteContact(id: number): Promise<void> {
    await this.initialize();
    if (!this.contacts.delete(id)) throw new NotFoundError();
  }

  // ============================================================
  // Boards
  // ============================================================

  async listBoards(): Promise<Board[]> {
    await this.initialize();
    return this.boards.list();
  }

  async getBoard(id: number): Promise<Board> {
    await this.initialize();
    const board = this.boards.get(id);
    if (!board) throw new NotFoundError();
    return board;
  }

  async createBoard(payload: unknown): Promise<Board> {
    await this.initialize();
    const { name } = parseInput(BoardInputSchema, payload);
    this.assertBoardNameFree(name);
    return this.boards.create(name);
  }

  /** Boards carry a single field, so PUT and PATCH both rename. */
  async renameBoard(id: number, payload: unknown): Promise<Board> {
    await this.initialize();
    if (!this.boards.get(id)) throw new NotFoundError();

    const { name } = parseInput(BoardInputSchema, payload);
    this.assertBoardNameFree(name, id);

    const board = this.boards.rename(id, name);
    if (!board) throw new NotFoundError();
    return board;
  }

  async deleteBoard(id: number): Promise<void> {
    await this.initialize();
    if (!this.boards.delete(id)) throw new NotFoundError();
  }

  // ============================================================
  // Accounts
  // ============================================================

  /**
   * Register a user, create their profile and issue a token.
   */
  async register(payload: unknown): Promise<AuthResult> {
    await this.initialize();
    const input = parseInput(RegistrationInputSchema, payload);

    const user = this.createUserRecord({
      email: input.email,
      username: input.username,
      password: input.password
    });
    return this.issueToken(user);
  }

  /**
   * Create an account outside the registration flow (CLI).
   */
  async createUser(options: CreateUserOptions): Promise<User> {
    await this.initialize();
    return this.createUserRecord(options);
  }

  async login(payload: unknown): Promise<AuthResult> {
    await this.initialize();
    const input = parseInput(LoginInputSchema, payload);

    const user = this.users.findByEmail(input.email);
    if (!user || !verifyPassword(input.password, user.passwordHash)) {
      throw new InvalidCredentialsError();
    }
    return this.issueToken(user);
  }

  async logout(userId: number): Promise<void> {
    await this.initialize();
    this.users.deleteToken(userId);
  }

  async authenticateToken(key: string): Promise<AuthUser | null> {
    await this.initialize();
    const user = this.users.findByToken(key);
    if (!user) return null;
    return {
      id: user.id,
      email: user.email,
      username: user.username,
      isStaff: user.isStaff,
      isSuperuser: user.isSuperuser
    };
  }

  async findUserByEmail(email: string): Promise<User | null> {
    await this.initialize();
    return this.users.findByEmail(email);
  }

  async getProfile(userId: number): Promise<Profile> {
    await this.initialize();
    return this.toProfile(userId, this.users.getOrCreateProfile(userId));
  }

  async updateProfile(userId: number, payload: unknown): Promise<Profile> {
    await this.initialize();
    const patch = parseInput(ProfilePatchSchema, payload);
    return this.toProfile(userId, this.users.updateProfile(userId, patch));
  }

  async changePassword(userId: number, payload: unknown): Promise<void> {
    await this.initialize();
    const input = parseInput(PasswordChangeInputSchema, payload);

    const user = this.users.get(userId);
    if (!user) throw new NotFoundError();
    if (!verifyPassword(input.current_password, user.passwordHash)) {
      throw ValidationError.forField('current_password', 'Incorrect password');
    }
    this.users.setPasswordHash(userId, hashPassword(input.new_password));
  }

  // ============================================================
  // Helpers
  // ============================================================

  private toTask(row: TaskRow): Task {
    const contacts = this.contacts.listForTask(row.id);
    return {
      ...row,
      contact_ids: contacts.map(contact => contact.id),
      contacts,
      subtasks: this.subtasks.listForTask(row.id)
    };
  }

  private toProfile(userId: number, profile: { bio: string | null; location: string | null }): Profile {
    const user = this.users.get(userId);
    if (!user) throw new NotFoundError();
    return {
      email: user.email,
      username: user.username,
      bio: profile.bio,
      location: profile.location
    };
  }

  private createUserRecord(options: CreateUserOptions): User {
    const email = options.email.trim().toLowerCase();
    if (this.users.findByEmail(email)) {
      throw ValidationError.forField('email', 'Email already exists');
    }
    if (this.users.findByUsername(options.username)) {
      throw ValidationError.forField('username', 'A user with that username already exists.');
    }

    return this.store.transaction(() => {
      const user = this.users.create({
        email,
        username: options.username,
        passwordHash: hashPassword(options.password),
        isStaff: options.isStaff,
        isSuperuser: options.isSuperuser
      });
      this.users.getOrCreateProfile(user.id);
      return user;
    });
  }

  private issueToken(user: User): AuthResult {
    return {
      token: this.users.getOrCreateToken(user.id),
      user_id: user.id,
      email: user.email,
      username: user.username
    };
  }

  private assertTaskExists(taskId: number): void {
    if (!this.tasks.exists(taskId)) {
      throw ValidationError.forField('task', invalidPk(taskId));
    }
  }

  private assertContactEmailFree(email: string, excludeId?: number): void {
    if (this.contacts.isEmailTaken(email, excludeId)) {
      throw ValidationError.forField('email', 'contact with this email already exists.');
    }
  }

  private assertBoardNameFree(name: string, excludeId?: number): void {
    if (this.boards.isNameTaken(name, excludeId)) {
      throw ValidationError.forField('name', 'board with this name already exists.');
    }
  }
}

// ============================================================
// Service instances
// ============================================================

export function createTaskboardService(config: TaskboardServiceConfig): TaskboardService {
  return new TaskboardService(config);
}
