/**
 * ReleaseRelay — Dispatcher
 *
 * Sends one announcement to every destination. Destinations are attempted
 * independently with bounded parallelism, and the result keeps one outcome
 * per destination so partial success stays visible to the caller.
 */

import pLimit from 'p-limit';
import type {
  AnnouncementRecord,
  DestinationConfig,
  DestinationOutcome,
  DispatchResult,
} from '../types';
import { DeliveryError, errorMessage } from '../lib/errors';
import { logger, type Logger } from '../lib/logger';
import { buildAnnouncementSlackMessage, sendViaWebhook, type SlackMessage } from './slack';

export type WebhookSender = (url: string, message: SlackMessage, timeoutMs: number) => Promise<number>;

export interface DispatcherOptions {
  concurrency: number;
  timeoutMs: number;
  sender?: WebhookSender;
  logger?: Logger;
}

/**
 * Webhook URLs embed their credentials; keep only the host and the
 * last four characters.
 */
export function redactWebhookUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.host}/…${url.slice(-4)}`;
  } catch {
    return `…${url.slice(-4)}`;
  }
}

export class Dispatcher {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly send: WebhookSender;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.limit = pLimit(options.concurrency);
    this.send = options.sender ?? sendViaWebhook;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? logger.child({ component: 'dispatcher' });
  }

  async dispatch(
    record: AnnouncementRecord,
    destinations: readonly DestinationConfig[]
  ): Promise<DispatchResult> {
    const message = buildAnnouncementSlackMessage(record);

    const outcomes = await Promise.all(
      destinations.map((destination, index) =>
        this.limit(() => this.deliverOne(record, message, destination, index))
      )
    );

    const deliveredCount = outcomes.filter(o => o.delivered).length;

    return {
      recordId: record.id,
      outcomes,
      allDelivered: deliveredCount === destinations.length,
      deliveredCount,
      failedCount: destinations.length - deliveredCount,
    };
  }

  private async deliverOne(
    record: AnnouncementRecord,
    message: SlackMessage,
    destination: DestinationConfig,
    index: number
  ): Promise<DestinationOutcome> {
    const label = redactWebhookUrl(destination.endpointURL);

    try {
      const status = await this.send(destination.endpointURL, message, this.timeoutMs);
      this.logger.debug('Delivered to destination', { recordId: record.id, destination: label });
      return { index, destination: label, delivered: true, status };
    } catch (error) {
      const failure =
        error instanceof DeliveryError
          ? error
          : new DeliveryError(errorMessage(error), 'unreachable', undefined, { cause: error });

      this.logger.warn('Delivery failed', {
        recordId: record.id,
        destination: label,
        reason: failure.reason,
        status: failure.status,
        error: failure.message,
      });

      return {
        index,
        destination: label,
        delivered: false,
        status: failure.status,
        reason: failure.reason,
        error: failure.message,
      };
    }
  }
}
