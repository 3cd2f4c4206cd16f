// =============================================================================
// COURSEWORK — Notifications
//
// Outbound messages go through a Notifier. The default one writes to the
// console; a mail transport would implement the same interface.
// =============================================================================

import { RawFields } from '../../types/pipeline';
import { contactForm, ContactMessage } from '../pipeline/forms';
import { validateOrThrow } from '../pipeline/validate';

export interface OutboundMessage {
  to: string;
  subject: string;
  body: string;
  replyTo?: string;
}

export interface Notifier {
  /** Rejects when the message could not be handed over. */
  send(message: OutboundMessage): Promise<void>;
}

export class ConsoleNotifier implements Notifier {
  async send(message: OutboundMessage): Promise<void> {
    console.log(`[Notify] To: ${message.to} | Subject: ${message.subject}`);
  }
}

/**
 * "Contact us" form: validated, then sent to the staff recipient with
 * the sender as reply-to.
 */
export class ContactService {
  constructor(
    private readonly notifier: Notifier,
    private readonly recipient: string,
  ) {}

  async send(raw: RawFields): Promise<ContactMessage> {
    const contact = await validateOrThrow(contactForm, raw);
    await this.notifier.send({
      to: this.recipient,
      subject: `Contact Us Message from ${contact.name}`,
      body: `Name: ${contact.name}\nEmail: ${contact.email}\n\nMessage:\n${contact.message}`,
      replyTo: contact.email,
    });
    return contact;
  }
}
