import { describe, it, expect, vi } from 'vitest';
import { renderMail } from '../../../src/infrastructure/mail/templates.js';
import { ConsoleMailer, NodemailerMailer, createMailer } from '../../../src/infrastructure/mail/Mailer.js';
import { gravatarUrl } from '../../../src/infrastructure/avatar/GravatarProvider.js';
import { Logger } from '../../../src/utils/logger.js';

describe('mail templates', () => {
  it('renders the confirmation link from host and token', () => {
    const mail = renderMail({
      to: 'a@x.io',
      template: 'confirm-email',
      variables: { username: 'alice', host: 'http://contacts.test/', token: 'abc.def.ghi' },
    });

    expect(mail.subject).toBe('Confirm your email');
    expect(mail.text).toContain('http://contacts.test/api/auth/confirmed_email/abc.def.ghi');
    expect(mail.html).toContain('<a href="http://contacts.test/api/auth/confirmed_email/abc.def.ghi">');
  });

  it('escapes user-controlled values in html', () => {
    const mail = renderMail({
      to: 'a@x.io',
      template: 'reset-password',
      variables: { username: '<b>eve</b>', resetLink: 'http://contacts.test/r' },
    });

    expect(mail.html).toContain('<p>Hi &lt;b&gt;eve&lt;/b&gt;,</p>');
    expect(mail.text).toContain('Hi <b>eve</b>,');
  });
});

describe('mailers', () => {
  it('console driver logs the rendered message', async () => {
    const logger = new Logger('Test', 100);
    const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);

    await new ConsoleMailer(logger).send({
      to: 'a@x.io',
      template: 'reset-password',
      variables: { username: 'alice', resetLink: 'http://contacts.test/r' },
    });

    expect(info).toHaveBeenCalledWith('Mail (console driver)', {
      to: 'a@x.io',
      template: 'reset-password',
      subject: 'Reset your password',
    });
  });

  it('console driver keeps confirmation tokens out of the log', async () => {
    const logger = new Logger('Test', 100);
    const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);

    await new ConsoleMailer(logger).send({
      to: 'a@x.io',
      template: 'confirm-email',
      variables: { username: 'alice', host: 'http://contacts.test/', token: 'secret-token-value' },
    });

    expect(info).toHaveBeenCalledTimes(1);
    expect(JSON.stringify(info.mock.calls[0])).not.toContain('secret-token-value');
  });

  it('smtp driver hands the rendered message to nodemailer', async () => {
    const sendMail = vi.fn().mockResolvedValue({ messageId: '1' });

    await new NodemailerMailer({ sendMail }, 'Contacts <noreply@contacts.test>', new Logger('Test', 100)).send({
      to: 'a@x.io',
      template: 'confirm-email',
      variables: { username: 'alice', host: 'http://contacts.test/', token: 't' },
    });

    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({ from: 'Contacts <noreply@contacts.test>', to: 'a@x.io', subject: 'Confirm your email' })
    );
  });

  it('createMailer picks the console driver by default', () => {
    expect(createMailer({ driver: 'console', from: 'noreply@contacts.test' })).toBeInstanceOf(ConsoleMailer);
    expect(() => createMailer({ driver: 'smtp', from: 'noreply@contacts.test' })).toThrow(/SMTP_URL/);
  });
});

describe('gravatarUrl', () => {
  it('hashes the trimmed, lower-cased email', () => {
    expect(gravatarUrl('  MyEmailAddress@example.com ')).toBe(
      'https://www.gravatar.com/avatar/0bc83cb571cd1c50ba6f3e8a78ef1346?s=200&d=identicon'
    );
  });
});
