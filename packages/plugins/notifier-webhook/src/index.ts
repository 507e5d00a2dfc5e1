import { z } from "zod";
import {
  parsePluginConfig,
  type NotificationSystem,
  type NotifyContext,
  type PluginContext,
  type PluginInstance,
  type PluginModule,
} from "@greenlight/core";

export const manifest = {
  name: "webhook",
  version: "0.1.0",
  description: "Notification plugin: JSON webhook posts (Slack-compatible)",
  vendor: "greenlight",
  capabilities: ["notification"] as const,
};

const ConfigSchema = z.object({
  url: z
    .string()
    .url()
    .refine((url) => url.startsWith("https://"), "must be an https URL")
    .optional(),
  username: z.string().min(1).default("Greenlight"),
  channel: z.string().min(1).optional(),
});

function buildBlocks(title: string, message: string, context?: NotifyContext): unknown[] {
  const blocks: unknown[] = [
    {
      type: "header",
      text: { type: "plain_text", text: title, emoji: true },
    },
    {
      type: "section",
      text: { type: "mrkdwn", text: message },
    },
  ];

  const facts: string[] = [];
  if (context?.projectName) facts.push(`*Project:* ${context.projectName}`);
  if (context?.assetId) facts.push(`*Asset:* ${context.assetId}`);
  if (context?.actor) facts.push(`*By:* ${context.actor}`);
  if (facts.length > 0) {
    blocks.push({
      type: "context",
      elements: [{ type: "mrkdwn", text: facts.join(" | ") }],
    });
  }

  blocks.push({ type: "divider" });
  return blocks;
}

async function postToWebhook(url: string, payload: Record<string, unknown>): Promise<void> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`Webhook failed (${response.status}): ${body}`);
  }
}

export function create(context: PluginContext): PluginInstance {
  const { url, username, channel } = parsePluginConfig(manifest.name, ConfigSchema, context.config);

  if (!url) {
    context.logger.warn("No url configured; notifications will be no-ops");
  }

  const notification: NotificationSystem = {
    name: manifest.name,

    async notify(title, message, notifyContext) {
      if (!url) return;

      const payload: Record<string, unknown> = {
        username,
        text: title,
        blocks: buildBlocks(title, message, notifyContext),
      };
      if (channel) payload.channel = channel;

      await postToWebhook(url, payload);
    },
  };

  return { capabilities: { notification } };
}

export default { manifest, create } satisfies PluginModule;
