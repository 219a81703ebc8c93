#!/usr/bin/env -S node --import tsx
import { readFileSync } from 'fs';
import chalk from 'chalk';
import { Command } from 'commander';
import { TaskPayload } from '@promptqueue/sdk';
import { AddTaskInput, ListTasksInput } from './api/operations.service';
import {
    formatDaemonStatus,
    formatStats,
    formatTaskDetail,
    formatTaskTable,
    toJson,
} from './cli/format';
import { parseInteger, parsePayload, parseTimePoint } from './cli/parse';
import { AppConfig, loadConfig } from './config';
import { DaemonController } from './daemon/controller';
import { runDaemon } from './daemon/run';
import { QueueError, ValidationError } from './errors/queue.errors';
import { createRuntime, Runtime } from './runtime';
import { VERSION } from './version';

export interface CliIO {
    out: (text: string) => void;
    err: (text: string) => void;
    setExitCode: (code: number) => void;
    loadConfig: () => AppConfig;
    createRuntime: (config: AppConfig) => Runtime;
    createController: (config: AppConfig) => DaemonController;
    runDaemon: (config: AppConfig) => Promise<number>;
}

const defaultIO: CliIO = {
    out: (text) => process.stdout.write(`${text}\n`),
    err: (text) => process.stderr.write(`${text}\n`),
    setExitCode: (code) => { process.exitCode = code; },
    loadConfig: () => loadConfig(),
    createRuntime: (config) => createRuntime(config),
    createController: (config) => new DaemonController(config),
    runDaemon: (config) => runDaemon(config),
};

interface JsonFlag { json?: boolean }
interface AddOptions extends JsonFlag { payload?: string; payloadFile?: string; prompt?: string; priority?: string; maxAttempts?: string }
interface ListOptions extends JsonFlag { status?: string; priority?: string; kind?: string; since?: string; until?: string; limit?: string; offset?: string }
interface StatusOptions extends JsonFlag { verbose?: boolean }
interface RemoveOptions extends JsonFlag { force?: boolean }
interface PurgeOptions extends JsonFlag { olderThanDays: string }
interface StopFlag { force?: boolean }

/**
 * The promptqueue command line. Commands only validate and format; the
 * operations API does the work.
 */
export function buildProgram(io: CliIO = defaultIO): Command {
    const program = new Command()
        .name('promptqueue')
        .description('Persistent, prioritized background queue for LLM tasks')
        .version(VERSION);

    // Runs an action with a runtime that is closed afterwards; QueueErrors become exit codes.
    const withRuntime = <A extends unknown[]>(json: (args: A) => boolean, action: (runtime: Runtime, ...args: A) => void) =>
        (...args: A) => {
            let runtime: Runtime | null = null;
            try {
                runtime = io.createRuntime(io.loadConfig());
                action(runtime, ...args);
            } catch (err) {
                report(err, json(args));
            } finally {
                runtime?.close();
            }
        };

    const report = (err: unknown, json: boolean) => {
        if (err instanceof QueueError) {
            io.err(json ? toJson({ error: err.toJSON() }) : `${chalk.red('Error:')} ${err.message}`);
            io.setExitCode(err.exitCode);
            return;
        }
        const message = err instanceof Error ? err.message : String(err);
        io.err(json ? toJson({ error: { code: 'INTERNAL_ERROR', message } }) : `${chalk.red('Error:')} ${message}`);
        io.setExitCode(1);
    };

    program
        .command('add <kind>')
        .description('Queue a task of the given kind')
        .option('--payload <json>', 'Payload as a JSON object')
        .option('--payload-file <path>', 'Read the JSON payload from a file')
        .option('--prompt <text>', 'Shorthand for a payload with a "prompt" field')
        .option('-p, --priority <priority>', 'low | normal | high | urgent', 'normal')
        .option('--max-attempts <n>', 'Attempts before the task fails for good')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([, opts]: [string, AddOptions]) => Boolean(opts.json),
            (runtime, kind: string, opts: AddOptions) => {
                const input: AddTaskInput = {
                    kind,
                    payload: buildPayload(opts),
                    priority: opts.priority,
                    maxAttempts: opts.maxAttempts === undefined ? undefined : parseInteger(opts.maxAttempts, 'max-attempts', 1),
                };
                const id = runtime.operations.add(input);
                io.out(opts.json ? toJson({ id }) : `${chalk.green('Queued')} ${id}`);
            },
        ));

    program
        .command('list')
        .alias('ls')
        .description('List tasks, newest first')
        .option('-s, --status <statuses>', 'Comma-separated statuses')
        .option('-p, --priority <priorities>', 'Comma-separated priorities')
        .option('-k, --kind <kinds>', 'Comma-separated kinds')
        .option('--since <time>', 'Created at or after (ISO date or age like 2h, 7d)')
        .option('--until <time>', 'Created before (ISO date or age)')
        .option('-n, --limit <n>', 'Maximum rows', '50')
        .option('--offset <n>', 'Rows to skip', '0')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([opts]: [ListOptions]) => Boolean(opts.json),
            (runtime, opts: ListOptions) => {
                const input: ListTasksInput = {
                    status: opts.status,
                    priority: opts.priority,
                    kind: opts.kind,
                    createdAfter: opts.since === undefined ? undefined : parseTimePoint(opts.since, 'since'),
                    createdBefore: opts.until === undefined ? undefined : parseTimePoint(opts.until, 'until'),
                    limit: opts.limit === undefined ? undefined : parseInteger(opts.limit, 'limit', 1),
                    offset: opts.offset === undefined ? undefined : parseInteger(opts.offset, 'offset'),
                };
                const tasks = runtime.operations.list(input);
                io.out(opts.json ? toJson(tasks) : formatTaskTable(tasks));
            },
        ));

    program
        .command('status <id>')
        .description('Show one task')
        .option('-v, --verbose', 'Include payload and result')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([, opts]: [string, StatusOptions]) => Boolean(opts.json),
            (runtime, id: string, opts: StatusOptions) => {
                const detail = runtime.operations.status(id, Boolean(opts.verbose));
                io.out(opts.json ? toJson(detail) : formatTaskDetail(detail));
            },
        ));

    program
        .command('remove <id>')
        .alias('rm')
        .description('Delete a task; pending or running tasks need --force')
        .option('-f, --force', 'Remove even if pending or running')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([, opts]: [string, RemoveOptions]) => Boolean(opts.json),
            (runtime, id: string, opts: RemoveOptions) => {
                const removed = runtime.operations.remove(id, Boolean(opts.force));
                io.out(opts.json ? toJson({ id, removed }) : `${chalk.green('Removed')} ${id}`);
            },
        ));

    program
        .command('cancel <id>')
        .description('Cancel a pending task, or ask a running one to stop')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([, opts]: [string, JsonFlag]) => Boolean(opts.json),
            (runtime, id: string, opts: JsonFlag) => {
                const task = runtime.operations.cancel(id);
                if (opts.json) {
                    io.out(toJson(task));
                } else if (task.status === 'running') {
                    io.out(`${chalk.yellow('Stop requested')} for running task ${id}`);
                } else {
                    io.out(`${chalk.green('Cancelled')} ${id}`);
                }
            },
        ));

    program
        .command('retry <id>')
        .description('Requeue a failed or cancelled task with a fresh attempt budget')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([, opts]: [string, JsonFlag]) => Boolean(opts.json),
            (runtime, id: string, opts: JsonFlag) => {
                const task = runtime.operations.retry(id);
                io.out(opts.json ? toJson(task) : `${chalk.green('Requeued')} ${id}`);
            },
        ));

    program
        .command('stats')
        .description('Count tasks by status and kind')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([opts]: [JsonFlag]) => Boolean(opts.json),
            (runtime, opts: JsonFlag) => {
                const stats = runtime.operations.stats();
                io.out(opts.json ? toJson(stats) : formatStats(stats));
            },
        ));

    program
        .command('purge')
        .description('Delete finished tasks older than a number of days')
        .requiredOption('--older-than-days <n>', 'Age in days')
        .option('--json', 'Print JSON')
        .action(withRuntime(
            ([opts]: [PurgeOptions]) => Boolean(opts.json),
            (runtime, opts: PurgeOptions) => {
                const purged = runtime.operations.purgeDays(parseInteger(opts.olderThanDays, 'older-than-days'));
                io.out(opts.json ? toJson({ purged }) : `Purged ${purged} tasks`);
            },
        ));

    const daemon = program.command('daemon').description('Control the background daemon');

    daemon
        .command('start')
        .description('Start the daemon in the background')
        .action(async () => {
            try {
                const result = await io.createController(io.loadConfig()).start();
                if (result.started) {
                    io.out(`${chalk.green('Daemon started')} (pid ${result.pid})`);
                } else {
                    io.err(`${chalk.red('Error:')} ${result.message}`);
                    io.setExitCode(1);
                }
            } catch (err) {
                report(err, false);
            }
        });

    daemon
        .command('stop')
        .description('Stop the daemon after its current task')
        .option('-f, --force', 'Kill the daemon if it is still busy after the stop timeout')
        .action(async (opts: StopFlag) => {
            try {
                const result = await io.createController(io.loadConfig()).stop({ force: Boolean(opts.force) });
                if (!result.wasRunning) {
                    io.out('Daemon is not running');
                } else if (result.draining) {
                    io.out(`${chalk.yellow('Stop requested')}: daemon (pid ${result.pid}) exits once its current task finishes`);
                } else {
                    io.out(`${chalk.green('Daemon stopped')} (pid ${result.pid}${result.forced ? ', killed' : ''})`);
                }
            } catch (err) {
                report(err, false);
            }
        });

    daemon
        .command('restart')
        .description('Stop, then start the daemon')
        .option('-f, --force', 'Kill the old daemon if it is still busy after the stop timeout')
        .action(async (opts: StopFlag) => {
            try {
                const result = await io.createController(io.loadConfig()).restart({ force: Boolean(opts.force) });
                if (result.started) {
                    io.out(`${chalk.green('Daemon restarted')} (pid ${result.pid})`);
                } else {
                    io.err(`${chalk.red('Error:')} ${result.message}`);
                    io.setExitCode(1);
                }
            } catch (err) {
                report(err, false);
            }
        });

    daemon
        .command('status')
        .description('Show whether the daemon is running')
        .option('--json', 'Print JSON')
        .action((opts: JsonFlag) => {
            try {
                const status = io.createController(io.loadConfig()).status();
                io.out(opts.json ? toJson(status) : formatDaemonStatus(status));
            } catch (err) {
                report(err, Boolean(opts.json));
            }
        });

    daemon
        .command('run')
        .description('Run the daemon in the foreground')
        .action(async () => {
            try {
                io.setExitCode(await io.runDaemon(io.loadConfig()));
            } catch (err) {
                report(err, false);
            }
        });

    return program;
}

function readPayloadFile(path: string): string {
    try {
        return readFileSync(path, 'utf-8');
    } catch (err) {
        throw new ValidationError(`Cannot read payload file ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
}

function buildPayload(opts: AddOptions): TaskPayload {
    if (opts.payload !== undefined && opts.payloadFile !== undefined) {
        throw new ValidationError('Use either --payload or --payload-file, not both');
    }
    let payload: TaskPayload = {};
    if (opts.payload !== undefined) {
        payload = parsePayload(opts.payload);
    } else if (opts.payloadFile !== undefined) {
        payload = parsePayload(readPayloadFile(opts.payloadFile));
    }
    if (opts.prompt !== undefined) {
        payload = { ...payload, prompt: opts.prompt };
    }
    return payload;
}

if (require.main === module) {
    buildProgram().parseAsync(process.argv).catch((err: unknown) => {
        console.error(err);
        process.exit(1);
    });
}
