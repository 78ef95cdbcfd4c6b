export { loadConfig, envSchema, envTestModeProbe, parseFlag } from './env.js';
export type { AppConfig, Env } from './env.js';
export { loadNotificationConfig, DEFAULT_CONFIG } from './notifications.js';
export type { NotificationConfig } from './notifications.js';
