/**
 * ReleaseRelay — Delivery Module
 *
 * Formats announcements as Slack messages and fans them out to webhooks.
 */

export {
  buildAnnouncementSlackMessage,
  sendViaWebhook,
  escapeMrkdwn,
  truncate,
  SECTION_TEXT_LIMIT,
  type SlackMessage,
  type SlackBlock,
  type SlackText,
  type SlackElement,
} from './slack';

export {
  Dispatcher,
  redactWebhookUrl,
  type DispatcherOptions,
  type WebhookSender,
} from './dispatcher';
