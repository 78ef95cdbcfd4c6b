export { default as notificationsPlugin } from './notifications-plugin.js';
export type { NotificationsPluginOptions, NotificationRuntime } from './notifications-plugin.js';
