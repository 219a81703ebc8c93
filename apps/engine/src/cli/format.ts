import chalk from 'chalk';
import { TaskDetail, TaskSummary } from '../api/operations.service';
import { ControllerStatus } from '../daemon/controller';
import { taskStatus } from '../db/task.entity';
import { QueueStats } from '../repositories/task.repository';

const STATUS_COLOR: Record<taskStatus, (text: string) => string> = {
    [taskStatus.PENDING]: chalk.yellow,
    [taskStatus.RUNNING]: chalk.cyan,
    [taskStatus.COMPLETED]: chalk.green,
    [taskStatus.FAILED]: chalk.red,
    [taskStatus.CANCELLED]: chalk.gray,
};

export function colorStatus(status: taskStatus, width = 0): string {
    return STATUS_COLOR[status](status.padEnd(width));
}

export function formatDuration(ms: number): string {
    const totalSeconds = Math.max(0, Math.floor(ms / 1000));
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
    if (minutes > 0) return `${minutes}m ${seconds}s`;
    return `${seconds}s`;
}

function formatDate(date: Date | null | undefined): string {
    return date ? date.toISOString() : '-';
}

export function formatTaskTable(tasks: TaskSummary[]): string {
    if (tasks.length === 0) {
        return chalk.gray('No tasks found.');
    }
    const kindWidth = Math.max(4, ...tasks.map(t => t.kind.length));
    const header = chalk.bold(
        `${'ID'.padEnd(36)}  ${'STATUS'.padEnd(9)}  ${'PRIORITY'.padEnd(8)}  ${'KIND'.padEnd(kindWidth)}  ${'TRIES'.padEnd(5)}  CREATED`,
    );
    const rows = tasks.map(t => [
        t.id.padEnd(36),
        colorStatus(t.status, 9),
        t.priority.padEnd(8),
        t.kind.padEnd(kindWidth),
        `${t.attempts}/${t.maxAttempts}`.padEnd(5),
        formatDate(t.createdAt),
    ].join('  '));
    return [header, ...rows].join('\n');
}

function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    return JSON.stringify(value, null, 2);
}

export function formatTaskDetail(detail: TaskDetail): string {
    const lines = [
        `${chalk.bold('Task')} ${detail.id}`,
        `  kind:       ${detail.kind}`,
        `  status:     ${colorStatus(detail.status)}${detail.cancelRequested ? chalk.gray(' (stop requested)') : ''}`,
        `  priority:   ${detail.priority}`,
        `  attempts:   ${detail.attempts}/${detail.maxAttempts}`,
        `  created:    ${formatDate(detail.createdAt)}`,
        `  updated:    ${formatDate(detail.updatedAt)}`,
        `  started:    ${formatDate(detail.startedAt)}`,
        `  finished:   ${formatDate(detail.finishedAt)}`,
    ];
    if (detail.retryAt) {
        lines.push(`  retry at:   ${formatDate(detail.retryAt)}`);
    }
    if (detail.lockOwner) {
        lines.push(`  claimed by: ${detail.lockOwner} until ${formatDate(detail.lockExpiry)}`);
    }
    if (detail.error) {
        lines.push(`  error:      ${chalk.red(`${detail.error.name} [${detail.error.classification}]: ${detail.error.message}`)}`);
    }
    if (detail.payload !== undefined) {
        lines.push(chalk.bold('Payload'), formatValue(detail.payload));
    }
    if (detail.result !== undefined) {
        lines.push(chalk.bold('Result'), formatValue(detail.result));
    }
    return lines.join('\n');
}

export function formatStats(stats: QueueStats): string {
    const lines = [chalk.bold(`Tasks: ${stats.total}`)];
    for (const [status, count] of Object.entries(stats.byStatus)) {
        lines.push(`  ${status.padEnd(10)} ${count}`);
    }
    const kinds = Object.entries(stats.byKind);
    if (kinds.length > 0) {
        lines.push(chalk.bold('By kind'));
        for (const [kind, count] of kinds) {
            lines.push(`  ${kind.padEnd(20)} ${count}`);
        }
    }
    if (stats.oldestPendingAt) {
        lines.push(`Oldest pending: ${formatDate(stats.oldestPendingAt)}`);
    }
    return lines.join('\n');
}

export function formatDaemonStatus(status: ControllerStatus): string {
    if (!status.running) {
        const note = status.stale ? chalk.gray(' (stale marker found)') : '';
        return `${chalk.red('●')} daemon is not running${note}`;
    }
    return [
        `${chalk.green('●')} daemon is running (pid ${status.pid})`,
        `  version:    ${status.version ?? '-'}`,
        `  started:    ${formatDate(status.startedAt)}`,
        `  uptime:     ${formatDuration(status.uptimeMs ?? 0)}`,
        `  last poll:  ${formatDate(status.lastPollAt)}`,
        `  processed:  ${status.processed ?? 0}`,
        `  log file:   ${status.logFile}`,
    ].join('\n');
}

export function toJson(value: unknown): string {
    return JSON.stringify(value, null, 2);
}
