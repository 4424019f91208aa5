// Domain: Outbound mail contract

export interface MailTemplates {
  'confirm-email': { username: string; host: string; token: string };
  'reset-password': { username: string; resetLink: string };
}

export type MailTemplateId = keyof MailTemplates;

export type MailMessage = {
  [K in MailTemplateId]: { to: string; template: K; variables: MailTemplates[K] };
}[MailTemplateId];

/**
 * Mail transport. Implementations reject on delivery failure;
 * callers decide whether that is fatal.
 */
export interface IMailer {
  send(message: MailMessage): Promise<void>;
}
