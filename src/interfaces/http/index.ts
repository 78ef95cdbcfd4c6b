export { default as notificationRoutes } from './notification-routes.js';
