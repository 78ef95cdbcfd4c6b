export { payloadSchemas, inboundEventSchema, validatePayload } from './event-schema.js';
export type { InboundEvent } from './event-schema.js';
export { AvailabilityGate } from './availability-gate.js';
export type { AvailabilityGateOptions, TestModeProbe } from './availability-gate.js';
export { CaptureBuffer } from './capture-buffer.js';
export type { CapturedEvent } from './capture-buffer.js';
export { CaptureEventSink, GatedEventSink, describeError } from './event-sink.js';
export type { EventSink, PublishReceipt, PublishError, PublishErrorType, PublishRoute } from './event-sink.js';
export { DEFAULT_FALLBACK_POLICY, FALLBACK_MODES, isFallbackMode } from './fallback-policy.js';
export type { FallbackMode, FallbackPolicy } from './fallback-policy.js';
export {
  MESSAGE_DEFINITIONS,
  ROLE_DESCRIPTIONS,
  GENERIC_ROLE_DESCRIPTION,
  PROFESSIONAL_STATUS_TEXT,
  DEFAULT_GREETING_NAME,
  buildRenderContext,
  buildVerificationUrl,
  describeRole,
  describeProfessionalStatus,
} from './render-context.js';
export type { MailSettings, MessageDefinition } from './render-context.js';
export { NotificationMailer } from './notification-mailer.js';
export type { Delivery, DeliveryError } from './notification-mailer.js';
export { NotificationExecutor } from './notification-executor.js';
export type { TaskSuccess, TaskFailure } from './notification-executor.js';
export { NotificationService } from './notification-service.js';
export type { NotificationOutcome, NotificationStatus, NotificationServiceDeps } from './notification-service.js';
export { TaskDispatcher, TASK_NAMES } from './task-dispatcher.js';
export type { RetryPolicy, DispatchReceipt, DispatchError } from './task-dispatcher.js';
export { TEMPLATE_NAMES } from './ports.js';
export type {
  TemplateName,
  RenderContext,
  RenderError,
  TemplateRenderer,
  OutgoingEmail,
  TransportReceipt,
  TransportError,
  EmailTransport,
  NotificationJobData,
  EnqueueRequest,
  TaskQueue,
  TaskStatus,
  TaskStatusReader,
  FailureReporter,
} from './ports.js';
export { notificationRequestSchema, sendNotification } from './notification-request.js';
export type { NotificationRequest } from './notification-request.js';
