#!/usr/bin/env node
/**
 * Taskboard CLI
 * Runs the API server and inspects the task database
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { loadServerConfig, type ServerConfig } from '../core/config.js';
import { TASK_STATUSES } from '../core/types.js';
import { createTaskboardService, type TaskboardService } from '../services/taskboard-service.js';
import { startServer, stopServer } from '../server/index.js';
import { ValidationError } from '../core/errors.js';

const program = new Command();

program
  .name('taskboard')
  .description('Kanban task board API')
  .version('1.0.0')
  .option('--db <path>', 'SQLite database path (overrides TASKBOARD_DB_PATH)');

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

function resolveConfig(): ServerConfig {
  const config = loadServerConfig();
  const { db } = program.opts<{ db?: string }>();
  return db ? { ...config, dbPath: db } : config;
}

function openService(): TaskboardService {
  return createTaskboardService({ dbPath: resolveConfig().dbPath });
}

/**
 * Serve command
 */
program
  .command('serve')
  .description('Start the HTTP API server')
  .option('-p, --port <number>', 'Port to listen on', parsePort)
  .option('-H, --host <host>', 'Host to bind')
  .option('--quiet', 'Do not log each request')
  .action(async (options: { port?: number; host?: string; quiet?: boolean }) => {
    const base = resolveConfig();
    const config: ServerConfig = {
      ...base,
      port: options.port ?? base.port,
      host: options.host ?? base.host,
      logRequests: options.quiet ? false : base.logRequests
    };

    try {
      await startServer(config);
    } catch (error) {
      console.error('Server failed to start:', error);
      process.exit(1);
    }

    const shutdown = (signal: string) => {
      console.log(`\n[server] ${signal} received, shutting down`);
      stopServer()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Shutdown failed:', error);
          process.exit(1);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

/**
 * Summary command
 */
program
  .command('summary')
  .description('Show task counts per status')
  .action(async () => {
    const service = openService();

    try {
      const summary = await service.getSummary();

      console.log('\n📊 Task Summary\n');
      for (const status of TASK_STATUSES) {
        const bar = '█'.repeat(Math.min(20, summary[status]));
        console.log(`  ${status.padEnd(15)} ${bar} ${summary[status]}`);
      }
      console.log(`\nTotal: ${summary['total-tasks']}`);
      console.log(`Urgent: ${summary.urgent}`);
      console.log(`Completed: ${summary['completed-percentage']}%`);

      await service.shutdown();
    } catch (error) {
      console.error('Summary failed:', error);
      process.exit(1);
    }
  });

/**
 * Tasks command
 */
program
  .command('tasks')
  .description('List tasks')
  .addOption(new Option('-s, --status <status>', 'Only tasks in this column').choices([...TASK_STATUSES]))
  .action(async (options: { status?: string }) => {
    const service = openService();

    try {
      const tasks = await service.listTasks({ status: options.status });

      if (tasks.length === 0) {
        console.log('No tasks found.');
      }
      for (const task of tasks) {
        const done = task.subtasks.filter(subtask => subtask.completed).length;
        console.log(`#${task.id} [${task.status}] ${task.title}`);
        console.log(`   Due: ${task.due_date}  Priority: ${task.priority}`);
        if (task.subtasks.length > 0) {
          console.log(`   Subtasks: ${done}/${task.subtasks.length}`);
        }
        if (task.contacts.length > 0) {
          console.log(`   Assigned: ${task.contacts.map(contact => contact.name).join(', ')}`);
        }
      }

      await service.shutdown();
    } catch (error) {
      console.error('List failed:', error);
      process.exit(1);
    }
  });

/**
 * Contacts command
 */
program
  .command('contacts')
  .description('List contacts')
  .action(async () => {
    const service = openService();

    try {
      const contacts = await service.listContacts();
      for (const contact of contacts) {
        console.log(`#${contact.id} ${contact.name} <${contact.email}> ${contact.phone}`);
      }
      if (contacts.length === 0) {
        console.log('No contacts found.');
      }

      await service.shutdown();
    } catch (error) {
      console.error('List failed:', error);
      process.exit(1);
    }
  });

/**
 * Create-user command
 */
program
  .command('create-user')
  .description('Create a user account')
  .requiredOption('-e, --email <email>', 'Email address (used to log in)')
  .requiredOption('-u, --username <username>', 'Username')
  .requiredOption('-p, --password <password>', 'Password')
  .option('--staff', 'Mark the user as staff')
  .option('--superuser', 'Mark the user as superuser')
  .action(async (options: { email: string; username: string; password: string; staff?: boolean; superuser?: boolean }) => {
    const service = openService();

    try {
      const user = await service.createUser({
        email: options.email,
        username: options.username,
        password: options.password,
        isStaff: options.staff ?? false,
        isSuperuser: options.superuser ?? false
      });
      console.log(`✅ Created user #${user.id} (${user.email})`);

      await service.shutdown();
    } catch (error) {
      if (error instanceof ValidationError) {
        console.error(`Create user failed: ${error.message}`);
      } else {
        console.error('Create user failed:', error);
      }
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
