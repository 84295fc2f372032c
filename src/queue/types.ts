export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed'>;

export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress', 'completed', 'failed'];

export type TaskPayload = Record<string, unknown> | null;

export type TaskRow = {
  id: string;
  status: TaskStatus;
  result: number | null;
  error_message: string | null;
  last_error: string | null;
  attempt_count: number;
  progress: number | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
};

export type QueueMessageRow = {
  id: number;
  task_id: string;
  payload_json: string;
  deliveries: number;
  available_at: string;
  lease_owner: string | null;
  lease_expires_at: string | null;
  created_at: string;
  updated_at: string;
};

export type QueueMessage = {
  id: number;
  taskId: string;
  payload: TaskPayload;
  deliveries: number;
  leaseOwner: string | null;
  leaseExpiresAt: string | null;
};

export type QueueStats = {
  ready: number;
  delayed: number;
  leased: number;
};

export type EnqueueOptions = {
  delayMs?: number;
};

export type TerminalWrite = 'applied' | 'ignored';

export type ClaimOutcome =
  | { kind: 'claimed'; task: TaskRow }
  | { kind: 'duplicate'; task: TaskRow }
  | { kind: 'exhausted'; task: TaskRow }
  | { kind: 'not_found' };

export type FailureDecision =
  | { kind: 'retry'; delayMs: number; task: TaskRow }
  | { kind: 'failed'; task: TaskRow }
  | { kind: 'ignored'; task: TaskRow };

export type Clock = () => Date;
