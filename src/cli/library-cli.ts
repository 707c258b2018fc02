#!/usr/bin/env node

import { Command, Option } from 'commander';
import { LibraryManager } from '../LibraryManager.js';
import { errorMessage } from '../errors.js';
import type { LibraryItem, Task } from '../types/Library.js';

type GlobalOptions = {
  dataDir?: string;
  json?: boolean;
};

export interface CLIOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CLIOutput = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function formatItem(item: LibraryItem): string {
  const tags = item.tags.length ? ` [${item.tags.join(', ')}]` : '';
  return `${item.id}  ${item.title} (${item.category}, rating ${item.rating})${tags}`;
}

function formatTask(task: Task, effective: number): string {
  const due = task.deadline ? ` due ${task.deadline}` : '';
  return `${task.id}  [${task.priority}/${effective}] ${task.status} ${task.description}${due}`;
}

/** Inspection and maintenance commands for a library data directory. */
export class LibraryCLI {
  private json = false;
  /** 1 once any command has failed. */
  exitCode = 0;

  constructor(private readonly output: CLIOutput = consoleOutput) {}

  private print(text: string, data: unknown): void {
    this.output.out(this.json ? JSON.stringify(data, null, 2) : text);
  }

  private logError(message: string, error: unknown): void {
    if (this.json) {
      this.output.err(JSON.stringify({ type: 'error', message, error: errorMessage(error) }));
    } else {
      this.output.err(`[ERROR] ${message}: ${errorMessage(error)}`);
    }
    this.exitCode = 1;
  }

  private open(opts: GlobalOptions): LibraryManager {
    return LibraryManager.open({ dataDir: opts.dataDir });
  }

  private guard(label: string, program: Command, fn: (opts: GlobalOptions) => void): void {
    const opts = program.opts<GlobalOptions>();
    this.json = opts.json ?? false;
    try {
      fn(opts);
    } catch (error) {
      this.logError(`${label} failed`, error);
    }
  }

  buildProgram(): Command {
    const program = new Command();

    program
      .name('smart-library')
      .description('Inspect and maintain a smart-library data directory')
      .version('1.0.0')
      .option('-d, --data-dir <dir>', 'Library data directory (default: $SMART_LIBRARY_DIR or ~/.smart-library)')
      .option('--json', 'Print machine-readable JSON', false);

    program
      .command('stats')
      .description('Show item, keyword, tag, task and backup counts')
      .action(() =>
        this.guard('stats', program, opts => {
          const stats = this.open(opts).getStatistics();
          const categories = Object.entries(stats.categoryCounts)
            .map(([name, count]) => `  ${name}: ${count}`)
            .join('\n');
          this.print(
            [
              `Items: ${stats.totalItems} (${stats.mediaItems} media, ${stats.documentItems} documents)`,
              `Keywords: ${stats.totalKeywords}`,
              `Unique tags: ${stats.uniqueTags}`,
              `Tasks: ${stats.totalTasks} (${stats.overdueTasks} overdue)`,
              `Undo history: ${stats.undoHistorySize}`,
              `Recently viewed: ${stats.recentlyViewedCount}`,
              `Backups: ${stats.backupsAvailable}`,
              ...(categories ? ['Categories:', categories] : []),
            ].join('\n'),
            stats
          );
        })
      );

    program
      .command('search')
      .description('Ranked keyword search')
      .argument('<query>', 'Search terms')
      .option('-l, --limit <n>', 'Maximum number of results', '10')
      .action((query: string, options: { limit: string }) =>
        this.guard('search', program, opts => {
          const limit = Math.max(1, Number.parseInt(options.limit, 10) || 10);
          const results = this.open(opts).search(query).slice(0, limit);
          const text = results.length
            ? results.map(r => `${r.score.toString().padStart(4)}  ${formatItem(r.item)}`).join('\n')
            : `No results for "${query}"`;
          this.print(text, results);
        })
      );

    program
      .command('list')
      .description('List items in store order')
      .option('-c, --category <category>', 'Only items in this category (case-insensitive)')
      .option('-t, --tag <tag>', 'Only items with this tag')
      .action((options: { category?: string; tag?: string }) =>
        this.guard('list', program, opts => {
          const library = this.open(opts);
          let items = options.category !== undefined ? library.listItemsByCategory(options.category) : library.listItems();
          if (options.tag !== undefined) {
            const tagged = new Set(library.getItemsByTag(options.tag).map(i => i.id));
            items = items.filter(i => tagged.has(i.id));
          }
          this.print(items.length ? items.map(formatItem).join('\n') : 'No items', items);
        })
      );

    program
      .command('tasks')
      .description('List queued tasks in serving order')
      .addOption(new Option('--overdue', 'Only overdue tasks').conflicts('dueSoon'))
      .option('--due-soon', 'Only tasks due within 24 hours')
      .action((options: { overdue?: boolean; dueSoon?: boolean }) =>
        this.guard('tasks', program, opts => {
          const library = this.open(opts);
          const tasks = options.overdue
            ? library.listOverdueTasks()
            : options.dueSoon
              ? library.listDueSoonTasks()
              : library.listTasks();
          const text = tasks.length
            ? tasks.map(t => formatTask(t, library.effectivePriority(t))).join('\n')
            : 'No tasks';
          this.print(text, tasks);
        })
      );

    program
      .command('backup')
      .description('Copy the saved library into the backup directory')
      .action(() =>
        this.guard('backup', program, opts => {
          const backup = new LibraryManager({ dataDir: opts.dataDir }).createBackup();
          this.print(`Backup created: ${backup}`, { backup });
        })
      );

    program
      .command('backups')
      .description('List backups, newest first')
      .action(() =>
        this.guard('backups', program, opts => {
          const backups = new LibraryManager({ dataDir: opts.dataDir }).getRepository().listBackups();
          const text = backups.length
            ? backups.map(b => `${b.name}  ${b.size} bytes  ${b.modifiedAt}`).join('\n')
            : 'No backups';
          this.print(text, backups);
        })
      );

    program
      .command('verify')
      .description('Decode a library file without changing anything')
      .argument('[file]', 'File to check (default: the live library file)')
      .action((file: string | undefined) =>
        this.guard('verify', program, opts => {
          const report = new LibraryManager({ dataDir: opts.dataDir }).getRepository().verify(file);
          this.print(
            [
              `OK ${report.file}`,
              `Format version: ${report.header.version}`,
              `Saved at: ${report.savedAt}`,
              `Items: ${report.items}, tasks: ${report.tasks}, undo entries: ${report.undoEntries}`,
            ].join('\n'),
            report
          );
        })
      );

    program
      .command('rebuild')
      .description('Rebuild the search indices and save')
      .action(() =>
        this.guard('rebuild', program, opts => {
          const library = this.open(opts);
          library.rebuildIndices();
          library.save();
          const stats = library.getStatistics();
          this.print(`Rebuilt indices: ${stats.totalKeywords} keywords, ${stats.uniqueTags} tags`, stats);
        })
      );

    return program;
  }

  async run(argv: string[] = process.argv): Promise<void> {
    await this.buildProgram().parseAsync(argv);
  }
}

if (require.main === module) {
  const cli = new LibraryCLI();
  cli
    .run()
    .then(() => {
      process.exitCode = cli.exitCode;
    })
    .catch(error => {
      console.error(`[ERROR] ${errorMessage(error)}`);
      process.exit(1);
    });
}
