export { HeartbeatService } from './heartbeat.service';
export { Poller } from './poller';
export { Reaper } from './reaper';
export { TaskExecutor } from './task-executor';
export { QueueDaemon } from './daemon';
export type { ReapedTask } from './reaper';
export type { Outcome } from './task-executor';
export type { DaemonStatus, QueueDaemonOptions } from './daemon';
