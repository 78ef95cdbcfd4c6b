import type { Result } from 'neverthrow';
import type { EventKind, EventPayload, NotificationTask, TaskState } from '../domain/index.js';

/**
 * Ports the application layer depends on. Adapters live under
 * `infrastructure/` (Handlebars, nodemailer, BullMQ).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

export const TEMPLATE_NAMES = [
  'email_verification',
  'account_locked',
  'account_unlocked',
  'role_upgrade',
  'professional_status_upgrade',
] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export type RenderContext = Record<string, string | boolean>;

export interface RenderError {
  type: 'TEMPLATE_NOT_FOUND' | 'RENDER_FAILED';
  templateName: string;
  message: string;
}

export interface TemplateRenderer {
  render(templateName: string, context: RenderContext): Result<string, RenderError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

export interface OutgoingEmail {
  subject: string;
  html: string;
  to: string;
}

export interface TransportReceipt {
  messageId: string;
}

export interface TransportError {
  type: 'INVALID_RECIPIENT' | 'SEND_FAILED';
  message: string;
}

export interface EmailTransport {
  send(email: OutgoingEmail): Promise<Result<TransportReceipt, TransportError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Task queue
// ─────────────────────────────────────────────────────────────────────────────

/** Job body stored in the task queue. */
export interface NotificationJobData {
  kind: EventKind;
  payload: EventPayload;
  /** Broker entry the job was created from. */
  eventId: string;
}

export interface EnqueueRequest {
  /** Executor task name for the event kind. */
  taskName: string;
  /** Stable id; enqueueing the same id twice yields one task. */
  taskId: string;
  data: NotificationJobData;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface TaskQueue {
  /** Resolves with the task id once the queue accepted the task. */
  enqueue(request: EnqueueRequest): Promise<string>;
}

export interface TaskStatus {
  id: string;
  name: string;
  state: TaskState;
  attemptsMade: number;
  failedReason?: string;
  result?: unknown;
}

export interface TaskStatusReader {
  getStatus(taskId: string): Promise<TaskStatus | null>;
}

/** Receives tasks that exhausted their attempts. */
export interface FailureReporter {
  report(task: NotificationTask, reason: string): Promise<void>;
}
