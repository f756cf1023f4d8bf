/**
 * @file Notification Service - delivers safety alerts to the care team
 *
 * The safety monitor talks to a CareTeamNotifier and never to a channel
 * directly. Two implementations ship here:
 * - LoggingCareTeamNotifier: writes every alert to the log (default)
 * - EmergencyContactNotifier: forwards guardian alerts to a configured
 *   emergency contact by their preferred method, with a cooldown
 *
 * Delivery failures are logged and swallowed by the caller; they never stop
 * the fusion tick.
 */

import type { AlertLevel, SafetyEvent } from '../../models/safety';
import { createLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

const log = createLogger('NotificationService');

// ============================================================================
// Types
// ============================================================================

export interface TherapistAlertOptions {
  playSound: boolean;
  requireAcknowledgment: boolean;
}

export interface CareTeamNotifier {
  /** Surface an alert on the supervising therapist's screen. */
  alertTherapist(message: string, options: TherapistAlertOptions): Promise<void>;
  /** Notify the parent/guardian about a safety event. */
  notifyGuardian(event: SafetyEvent): Promise<void>;
  /** Record an event for later therapist review; no one is paged. */
  flagForReview(event: SafetyEvent): Promise<void>;
}

export type ContactMethod = 'notification' | 'sms' | 'both';

export interface EmergencyContact {
  name: string;
  phone: string;
  method: ContactMethod;
}

/**
 * Transport for guardian messages (push service, SMS gateway).
 */
export interface DeliveryChannel {
  sendNotification(contact: EmergencyContact, title: string, body: string): Promise<void>;
  sendSms(phone: string, body: string): Promise<void>;
}

// ============================================================================
// Messages
// ============================================================================

export function buildGuardianMessage(event: SafetyEvent): { title: string; body: string } {
  const urgency: Record<AlertLevel, string> = {
    none: 'Update',
    low: 'Notice',
    medium: 'Attention needed',
    high: 'Urgent',
  };

  return {
    title: `${urgency[event.level]}: therapy session alert`,
    body: `${event.description} at ${new Date(event.timestamp).toISOString()}.`,
  };
}

// ============================================================================
// Logging notifier
// ============================================================================

export class LoggingCareTeamNotifier implements CareTeamNotifier {
  async alertTherapist(message: string, options: TherapistAlertOptions): Promise<void> {
    log.warn({ ...options }, `Therapist alert: ${message}`);
  }

  async notifyGuardian(event: SafetyEvent): Promise<void> {
    log.warn({ trigger: event.trigger, level: event.level }, `Guardian notification: ${event.description}`);
  }

  async flagForReview(event: SafetyEvent): Promise<void> {
    log.info({ trigger: event.trigger, level: event.level }, `Flagged for review: ${event.description}`);
  }
}

// ============================================================================
// Emergency contact notifier
// ============================================================================

export class EmergencyContactNotifier implements CareTeamNotifier {
  private lastGuardianNotification: number | null = null;
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor(
    private readonly contact: EmergencyContact,
    private readonly channel: DeliveryChannel,
    private readonly therapist: CareTeamNotifier = new LoggingCareTeamNotifier(),
    options: { cooldownSeconds?: number; now?: () => number } = {}
  ) {
    this.cooldownMs = (options.cooldownSeconds ?? 600) * 1000;
    this.now = options.now ?? Date.now;
  }

  alertTherapist(message: string, options: TherapistAlertOptions): Promise<void> {
    return this.therapist.alertTherapist(message, options);
  }

  flagForReview(event: SafetyEvent): Promise<void> {
    return this.therapist.flagForReview(event);
  }

  /**
   * Deliver to the emergency contact unless one went out within the cooldown.
   * High-level events bypass the cooldown. A send that fails on every
   * channel does not start one.
   */
  async notifyGuardian(event: SafetyEvent): Promise<void> {
    const now = this.now();
    if (
      event.level !== 'high' &&
      this.lastGuardianNotification !== null &&
      now - this.lastGuardianNotification < this.cooldownMs
    ) {
      log.debug({ trigger: event.trigger }, 'Guardian cooldown active, skipping');
      return;
    }

    // Reserve the cooldown before awaiting so a concurrent call sees it
    const previous = this.lastGuardianNotification;
    this.lastGuardianNotification = now;

    const { title, body } = buildGuardianMessage(event);
    const deliveries: Promise<void>[] = [];

    if (this.contact.method === 'notification' || this.contact.method === 'both') {
      deliveries.push(this.channel.sendNotification(this.contact, title, body));
    }
    if (this.contact.method === 'sms' || this.contact.method === 'both') {
      deliveries.push(this.channel.sendSms(this.contact.phone, `${title}. ${body}`));
    }

    const results = await Promise.allSettled(deliveries);
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');

    if (failures.length === results.length) {
      if (this.lastGuardianNotification === now) this.lastGuardianNotification = previous;
      throw new Error(`Guardian notification failed: ${failures.map(f => errorMessage(f.reason)).join('; ')}`);
    }

    for (const failure of failures) {
      log.error({ err: failure.reason, contact: this.contact.name }, 'Guardian delivery partially failed');
    }
    log.info({ contact: this.contact.name, method: this.contact.method }, 'Guardian notified');
  }
}
