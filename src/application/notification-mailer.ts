import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { EventKind, EventPayload } from '../domain/index.js';
import { MESSAGE_DEFINITIONS, type MailSettings } from './render-context.js';
import type { EmailTransport, TemplateRenderer } from './ports.js';

export interface Delivery {
  kind: EventKind;
  to: string;
  subject: string;
  messageId: string;
}

export interface DeliveryError {
  type: 'RENDER' | 'TRANSPORT';
  kind: EventKind;
  message: string;
}

/**
 * Renders one event's email and hands it to the transport.
 *
 * Shared by the worker's executors and by the producer's direct-send
 * fallback, so both paths produce the same message for the same payload.
 */
export class NotificationMailer {
  constructor(
    private readonly renderer: TemplateRenderer,
    private readonly transport: EmailTransport,
    private readonly settings: MailSettings,
    private readonly log: Logger,
  ) {}

  async deliver(kind: EventKind, payload: EventPayload): Promise<Result<Delivery, DeliveryError>> {
    const message = MESSAGE_DEFINITIONS[kind];
    const context = message.buildContext(payload, this.settings);

    const rendered = this.renderer.render(message.templateName, context);
    if (rendered.isErr()) {
      this.log.warn({ kind, template: message.templateName, error: rendered.error }, 'Template rendering failed');
      return err({ type: 'RENDER', kind, message: rendered.error.message });
    }

    const to = typeof context['email'] === 'string' ? context['email'] : '';
    const sent = await this.transport.send({ subject: message.subject, html: rendered.value, to });
    if (sent.isErr()) {
      this.log.warn({ kind, to, error: sent.error }, 'Email transport failed');
      return err({ type: 'TRANSPORT', kind, message: sent.error.message });
    }

    this.log.debug({ kind, to, messageId: sent.value.messageId }, 'Email handed to transport');
    return ok({ kind, to, subject: message.subject, messageId: sent.value.messageId });
  }
}
