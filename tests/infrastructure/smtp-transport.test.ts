import { describe, it, expect, vi } from 'vitest';
import { SmtpEmailTransport } from '../../src/infrastructure/email/index.js';
import type { MailSender } from '../../src/infrastructure/email/index.js';
import { fakeLogger } from '../helpers.js';

function fakeSender() {
  const sendMail = vi.fn().mockResolvedValue({ messageId: '<m1@localhost>' });
  const close = vi.fn();
  const sender: MailSender = { sendMail, close };
  return { sender, sendMail, close };
}

const EMAIL = { subject: 'Account Unlocked Notification', html: '<p>Hello A,</p>', to: 'a@b.com' };

describe('SmtpEmailTransport', () => {
  it('sends from the configured address', async () => {
    const { sender, sendMail } = fakeSender();
    const transport = new SmtpEmailTransport(sender, 'no-reply@example.com', fakeLogger());

    const result = await transport.send(EMAIL);

    expect(result._unsafeUnwrap()).toEqual({ messageId: '<m1@localhost>' });
    expect(sendMail).toHaveBeenCalledWith({
      from: 'no-reply@example.com',
      to: 'a@b.com',
      subject: 'Account Unlocked Notification',
      html: '<p>Hello A,</p>',
    });
  });

  it('rejects an empty recipient without contacting the server', async () => {
    const { sender, sendMail } = fakeSender();
    const transport = new SmtpEmailTransport(sender, 'no-reply@example.com', fakeLogger());

    const result = await transport.send({ ...EMAIL, to: '  ' });

    expect(result._unsafeUnwrapErr()).toEqual({ type: 'INVALID_RECIPIENT', message: 'Recipient email address is empty' });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('returns SEND_FAILED when the server refuses', async () => {
    const { sender, sendMail } = fakeSender();
    sendMail.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:587'));
    const transport = new SmtpEmailTransport(sender, 'no-reply@example.com', fakeLogger());

    const result = await transport.send(EMAIL);

    expect(result._unsafeUnwrapErr()).toEqual({ type: 'SEND_FAILED', message: 'connect ECONNREFUSED 127.0.0.1:587' });
  });

  it('closes the underlying sender once', () => {
    const { sender, close } = fakeSender();
    const transport = new SmtpEmailTransport(sender, 'no-reply@example.com', fakeLogger());

    transport.close();
    transport.close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});
