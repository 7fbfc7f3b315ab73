import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LifecycleManager, MEMORY_PATH, SqliteBackend } from '@tasklet/core';
import { createProgram } from '../src/program.js';

// These tests drive the commander program against an in-memory store and
// check what each command prints.

describe('CLI commands', () => {
  let dir: string;
  let store: SqliteBackend;
  let manager: LifecycleManager;
  let logs: string[];

  function run(...args: string[]): string[] {
    logs = [];
    createProgram({ store, manager, configPath: join(dir, 'config.json') }).parse(args, { from: 'user' });
    return logs;
  }

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tasklet-cli-'));
    store = new SqliteBackend(MEMORY_PATH);
    manager = new LifecycleManager(store);
    manager.ensureDefaultCategories();
    logs = [];
    process.exitCode = undefined;
    // One entry per printed line; a task's description comes in the same call
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(...args.map(String).join(' ').split('\n'));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    store.close();
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  function seed(): void {
    run('add', 'Buy milk', '-c', 'Home');
    run('add', 'Buy milk', '-c', 'work');
    run('add', 'Call mom', '-p', 'high', '-d', 'about Sunday');
  }

  describe('add', () => {
    it('reports where the task went', () => {
      expect(run('add', 'Buy milk', '-c', 'Home')).toEqual([
        "Task 1 saved to 'Home'. Use the list command to see your tasks",
      ]);
      expect(run('add', 'Call mom')).toEqual([
        "Task 2 saved to 'uncategorized'. Use the list command to see your tasks",
      ]);
    });

    it('rejects a duplicate title in the same category', () => {
      run('add', 'Buy milk', '-c', 'Home');
      expect(run('add', 'Buy milk', '-c', 'Home')).toEqual(["A task titled 'Buy milk' already exists in category 1"]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('list', () => {
    it('groups tasks by category', () => {
      seed();
      expect(run('list')).toEqual([
        'uncategorized',
        '(3) >>> [ ] Call mom',
        '            about Sunday',
        '',
        'Home',
        '(1) >>  [ ] Buy milk',
        '',
        'Work',
        '(2) >>  [ ] Buy milk',
      ]);
    });

    it('filters by category, search and completion', () => {
      seed();
      run('check', '1');
      expect(run('list', '-c', 'Home')).toEqual(['Home', '(1) >>  [x] Buy milk']);
      expect(run('list', '--pending', '-s', 'MILK')).toEqual(['Work', '(2) >>  [ ] Buy milk']);
      expect(run('list', '--done', '--pending')).toEqual(['Cannot use both --done and --pending at the same time']);
    });

    it('says so when nothing matches', () => {
      expect(run('list', '--deleted')).toEqual(['No tasks found... use the add command to create one']);
    });
  });

  describe('check and uncheck', () => {
    it('asks for an ID when a title is ambiguous', () => {
      seed();
      expect(run('check', 'Buy milk')).toEqual(["'Buy milk' matches tasks 1, 2; use an ID or -c <category>"]);
      expect(process.exitCode).toBe(1);
    });

    it('resolves a title inside the given category', () => {
      seed();
      expect(run('check', 'Buy milk', '-c', 'Work')).toEqual(["Task 2 'Buy milk' checked"]);
      expect(run('check', '2')).toEqual(['Task 2 is already checked']);
      expect(run('uncheck', '2', 'nope')).toEqual(["Task 2 'Buy milk' unchecked", "Could not find task 'nope'"]);
    });
  });

  describe('update', () => {
    it('lists the candidates of an ambiguous title', () => {
      seed();
      expect(run('update', 'Buy milk', '-t', 'Buy oat milk')).toEqual([
        "'Buy milk' matches 2 tasks; specify an ID or a category",
        '  (1) Buy milk in Home',
        '  (2) Buy milk in Work',
        'Use the task ID, or narrow the search with -c <category>',
      ]);
    });

    it('changes the given fields', () => {
      seed();
      expect(run('update', 'Buy milk', '-c', 'Home', '-t', 'Buy oat milk', '-p', 'low')).toEqual([
        "Task 1 'Buy oat milk' updated",
      ]);
      expect(store.getTask(1)).toMatchObject({ title: 'Buy oat milk', priority: 'low' });
      expect(run('update', '1')).toEqual(['Nothing to update; pass --title, --priority or --description']);
    });
  });

  describe('delete, restore, move and flush', () => {
    it('moves a task through the Deleted category and back', () => {
      seed();
      expect(run('delete', 'Call mom')).toEqual(["Task 3 'Call mom' moved to Deleted"]);
      expect(run('list', '--deleted')).toEqual([
        'Deleted',
        '(3) >>> [ ] Call mom',
        '            about Sunday',
      ]);
      expect(run('restore', '3', 'Work')).toEqual(["Task 3 'Call mom' restored to 'Work'"]);
      expect(run('move', '3', 'uncategorized')).toEqual(["Task 3 'Call mom' moved to 'uncategorized'"]);
      expect(run('move', '3', 'deleted')).toEqual(["Task 3 'Call mom' moved to Deleted"]);
      expect(run('flush')).toEqual(['Permanently removed 1 deleted task(s)']);
      expect(store.getTask(3)).toBeNull();
    });

    it('only restores tasks that are deleted', () => {
      seed();
      expect(run('restore', '1')).toEqual(['Task 1 not found in Deleted']);
    });
  });

  describe('category', () => {
    it('adds, uses and deletes a category', () => {
      seed();
      expect(run('category', 'add', 'Gym')).toEqual(["Category 'Gym' added with ID 3"]);
      expect(run('category', 'use', 'gym')).toEqual(["Now using category 'Gym' (3)"]);
      expect(run('add', 'Lift')).toEqual(["Task 4 saved to 'Gym'. Use the list command to see your tasks"]);
      expect(run('category', 'list')).toEqual([
        '1: Home 1 task(s)',
        '2: Work 1 task(s)',
        '3: Gym 1 task(s) (current)',
      ]);

      expect(run('category', 'delete', 'Gym', '--to', 'Home')).toEqual([
        "Category 'Gym' deleted",
        "1 task(s) moved to 'Home'",
      ]);
      expect(run('category', 'show')).toEqual(['No category context set']);
      expect(run('category', 'add', 'Errands')).toEqual(["Category 'Errands' added with ID 3"]);
    });

    it('renames a category and refuses reserved names', () => {
      expect(run('category', 'rename', 'Work', 'Office')).toEqual(["Category 'Work' renamed to 'Office'"]);
      expect(run('category', 'rename', '1', 'Deleted')).toEqual(["'Deleted' is a reserved category name"]);
    });
  });

  describe('config', () => {
    it('lists settings with defaults marked', () => {
      run('config', 'set', 'default-priority=LOW');
      expect(run('config', 'list')).toEqual([
        '*deleted-task-lifespan = 0',
        ' default-priority = low',
        '*default-category = ',
        '*storage.type = json',
        '*storage.path = ',
      ]);
    });

    it('writes bootstrap keys to the config file', () => {
      expect(run('config', 'set', 'storage.type=sqlite')).toEqual([
        "storage.type set to 'sqlite'; takes effect on the next run",
      ]);
      expect(JSON.parse(readFileSync(join(dir, 'config.json'), 'utf8'))).toEqual({ 'storage.type': 'sqlite' });

      expect(run('config', 'default', 'storage.type')).toEqual(['storage.type reset to its default']);
      expect(JSON.parse(readFileSync(join(dir, 'config.json'), 'utf8'))).toEqual({});
    });

    it('validates store keys', () => {
      expect(run('config', 'set', 'default-category=gym')).toEqual(["No category named 'gym'"]);
      expect(run('config', 'set', 'default-category=work')).toEqual(["default-category set to 'Work'"]);
      expect(run('config', 'set', 'colour=red')).toEqual([
        "Unknown config key 'colour'. Valid keys: deleted-task-lifespan, default-priority, default-category, storage.type, storage.path",
      ]);
    });

    it('resets the store only when confirmed', () => {
      seed();
      expect(run('config', 'reset')).toEqual([
        'This deletes every task, category and setting in the store.',
        'Run again with --yes to continue',
      ]);
      expect(store.listTasks()).toHaveLength(3);

      expect(run('config', 'reset', '--yes')).toEqual(["Store reset; created 'Home' and 'Work'"]);
      expect(store.listTasks()).toEqual([]);
    });
  });

  describe('db', () => {
    it('reports the schema version', () => {
      expect(run('db', 'status')).toEqual([
        'Backend: sqlite',
        'Path:    :memory:',
        'Schema:  v4 (latest v4)',
      ]);
    });

    it('rolls the schema back and forward', () => {
      expect(run('db', 'migrate', '--to', '3')).toEqual([
        'Schema migrated down from v4 to v3 (applied v4)',
        'The next run upgrades the schema to the latest version again',
      ]);
      expect(run('db', 'migrate')).toEqual(['Schema migrated up from v3 to v4 (applied v4)']);
      expect(run('db', 'migrate')).toEqual(['Schema already at v4']);
    });
  });
});
