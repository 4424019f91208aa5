// Infrastructure: Mail templates
// Rendering of the outbound messages; values are HTML-escaped in the html part

import type { MailMessage } from '@/domain/mail/types.js';

export interface RenderedMail {
  subject: string;
  text: string;
  html: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function confirmationLink(host: string, token: string): string {
  return `${host}api/auth/confirmed_email/${token}`;
}

export function renderMail(message: MailMessage): RenderedMail {
  switch (message.template) {
    case 'confirm-email': {
      const { username, host, token } = message.variables;
      const link = confirmationLink(host, token);
      return {
        subject: 'Confirm your email',
        text: `Hi ${username},\n\nPlease confirm your email address by opening this link:\n${link}\n`,
        html:
          `<p>Hi ${escapeHtml(username)},</p>` +
          `<p>Please confirm your email address by following the link below.</p>` +
          `<p><a href="${escapeHtml(link)}">Confirm email</a></p>`,
      };
    }
    case 'reset-password': {
      const { username, resetLink } = message.variables;
      return {
        subject: 'Reset your password',
        text:
          `Hi ${username},\n\nA password change was requested for your account. ` +
          `Open this link to apply it:\n${resetLink}\n\nIf you did not ask for this, ignore this message.\n`,
        html:
          `<p>Hi ${escapeHtml(username)},</p>` +
          `<p>A password change was requested for your account.</p>` +
          `<p><a href="${escapeHtml(resetLink)}">Apply the new password</a></p>` +
          `<p>If you did not ask for this, ignore this message.</p>`,
      };
    }
  }
}
