import axios from "axios";
import axiosRetry from "axios-retry";
import { createChildLogger } from "../../config/logger.js";
import type { Lead, ScoringAlert } from "../../db/schemas/types.js";

const log = createChildLogger("connector:slack");

const client = axios.create({ timeout: 10_000 });

axiosRetry(client, {
  retries: 2,
  retryDelay: axiosRetry.exponentialDelay,
  retryCondition: (err) =>
    axiosRetry.isNetworkOrIdempotentRequestError(err) ||
    err.response?.status === 429,
});

interface SlackBlock {
  type: string;
  text?: { type: string; text: string };
  fields?: Array<{ type: string; text: string }>;
  [key: string]: unknown;
}

interface SlackMessage {
  text: string;
  blocks?: SlackBlock[];
  channel?: string;
}

const PRIORITY_EMOJI: Record<ScoringAlert["priority"], string> = {
  low: "ℹ️",
  medium: "📈",
  high: "🔥",
  urgent: "🚨",
};

/**
 * Send a message to Slack via incoming webhook
 */
export async function sendSlackMessage(message: SlackMessage): Promise<void> {
  const webhookUrl = process.env.SLACK_WEBHOOK_URL;
  if (!webhookUrl) {
    log.debug("SLACK_WEBHOOK_URL not configured, skipping Slack notification");
    return;
  }

  log.info("Sending Slack notification");

  await client.post(webhookUrl, {
    text: message.text,
    blocks: message.blocks,
    ...(message.channel ? { channel: message.channel } : {}),
  });
}

export function buildAlertMessage(alert: ScoringAlert, lead: Lead): SlackMessage {
  const emoji = PRIORITY_EMOJI[alert.priority];
  const fields = [
    { type: "mrkdwn", text: `*Score:*\n${alert.current_score}` },
    { type: "mrkdwn", text: `*Priority:*\n${alert.priority}` },
  ];
  if (alert.threshold_value !== null) {
    fields.push({ type: "mrkdwn", text: `*Threshold:*\n${alert.threshold_value}` });
  }
  if (lead.company_name) {
    fields.push({ type: "mrkdwn", text: `*Company:*\n${lead.company_name}` });
  }

  return {
    text: `${emoji} ${alert.title}`,
    blocks: [
      {
        type: "header",
        text: { type: "plain_text", text: `${emoji} ${alert.title}` },
      },
      {
        type: "section",
        text: { type: "mrkdwn", text: alert.message },
      },
      { type: "section", fields },
    ],
  };
}

/**
 * Notify supervisors about a scoring alert
 */
export async function notifyScoringAlert(
  alert: ScoringAlert,
  lead: Lead
): Promise<void> {
  await sendSlackMessage(buildAlertMessage(alert, lead));
}
