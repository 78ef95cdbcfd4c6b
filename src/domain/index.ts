export { EVENT_KINDS, EventKind, EVENT_DESCRIPTIONS, isEventKind, topicFor } from './event.js';
export type { PayloadValue, EventPayload, EventPayloadMap, NotificationEvent } from './event.js';
export { USER_ROLES } from './user.js';
export type { UserRole, NotificationUser } from './user.js';
export { resolveFailure } from './task.js';
export type { TaskState, NotificationTask, FailureTransition } from './task.js';
