export { HandlebarsTemplateRenderer, resolveTemplatesDir } from './template-renderer.js';
export { SmtpEmailTransport, createSmtpSender } from './smtp-transport.js';
export type { SmtpConfig, MailSender } from './smtp-transport.js';
