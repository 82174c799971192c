/**
 * ReleaseRelay — Slack Webhook Delivery
 *
 * Builds the Block Kit message for an announcement and posts it to a
 * Slack incoming webhook.
 */

import type { AnnouncementRecord } from '../types';
import { DeliveryError, errorMessage, isTimeoutError } from '../lib/errors';

// ============================================================
// TYPES
// ============================================================

export interface SlackMessage {
  text: string;
  blocks?: SlackBlock[];
  unfurl_links?: boolean;
  unfurl_media?: boolean;
}

export interface SlackBlock {
  type: string;
  text?: SlackText;
  elements?: Array<SlackElement | SlackText>;
  accessory?: SlackElement;
  block_id?: string;
}

export interface SlackText {
  type: 'plain_text' | 'mrkdwn';
  text: string;
  emoji?: boolean;
}

export interface SlackElement {
  type: string;
  text?: SlackText;
  url?: string;
  action_id?: string;
  style?: string;
}

/** Slack rejects section text longer than this. */
export const SECTION_TEXT_LIMIT = 3000;

// ============================================================
// BLOCK BUILDERS
// ============================================================

function section(text: string): SlackBlock {
  return {
    type: 'section',
    text: { type: 'mrkdwn', text },
  };
}

function plainSection(text: string, accessory?: SlackElement): SlackBlock {
  return {
    type: 'section',
    text: { type: 'plain_text', text },
    ...(accessory ? { accessory } : {}),
  };
}

function button(text: string, url: string, style?: 'primary' | 'danger'): SlackElement {
  return {
    type: 'button',
    text: { type: 'plain_text', text },
    url,
    action_id: 'button-link',
    ...(style ? { style } : {}),
  };
}

function divider(): SlackBlock {
  return { type: 'divider' };
}

/**
 * Escape the three characters Slack treats as control sequences in mrkdwn.
 */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Cut text to `limit` code points, ending with an ellipsis when shortened.
 */
export function truncate(text: string, limit: number = SECTION_TEXT_LIMIT): string {
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return `${chars.slice(0, limit - 1).join('')}…`;
}

/**
 * Like truncate, for escaped mrkdwn: an entity split by the cut is dropped.
 */
function truncateEscaped(text: string, limit: number): string {
  const truncated = truncate(text, limit);
  return truncated === text ? text : truncated.replace(/&[a-z]*…$/, '…');
}

function linkedTitle(link: string, title: string): string {
  const wrapperLength = Array.from(`:rocket: <${link}|>`).length;
  const budget = Math.max(1, SECTION_TEXT_LIMIT - wrapperLength);
  return `:rocket: <${link}|${truncateEscaped(escapeMrkdwn(title), budget)}>`;
}

// ============================================================
// MESSAGE BUILDERS
// ============================================================

/**
 * Build the Slack message for one announcement.
 */
export function buildAnnouncementSlackMessage(record: AnnouncementRecord): SlackMessage {
  const title = record.title;
  const body = record.body.length > 0 ? record.body : title;

  return {
    text: title,
    blocks: [
      section(linkedTitle(record.link, title)),
      plainSection(truncate(body), button('Read More', record.link, 'primary')),
      divider(),
    ],
  };
}

// ============================================================
// SEND FUNCTIONS
// ============================================================

/**
 * POST a message to an incoming webhook. Fails with DeliveryError.
 * Returns the HTTP status of the accepted request.
 */
export async function sendViaWebhook(
  webhookUrl: string,
  message: SlackMessage,
  timeoutMs: number
): Promise<number> {
  let res: Response;

  try {
    res = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(message),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new DeliveryError(`Slack webhook timed out after ${timeoutMs}ms`, 'timeout', undefined, {
        cause: error,
      });
    }
    throw new DeliveryError(`Slack webhook unreachable: ${errorMessage(error)}`, 'unreachable', undefined, {
      cause: error,
    });
  }

  if (res.status === 429) {
    const retryAfter = res.headers.get('retry-after');
    throw new DeliveryError(
      `Slack webhook rate limited${retryAfter ? ` (retry after ${retryAfter}s)` : ''}`,
      'rate_limited',
      res.status
    );
  }

  if (!res.ok) {
    const detail = await res.text().catch(() => '');
    throw new DeliveryError(
      `Slack webhook error: ${res.status}${detail ? ` - ${detail}` : ''}`,
      'rejected',
      res.status
    );
  }

  return res.status;
}
