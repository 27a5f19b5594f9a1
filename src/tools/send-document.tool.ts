// ═════════════════════════════════════════════════════════════════════════════
// SEND DOCUMENT TOOL — Exposes document delivery to the agent runtime
// ═════════════════════════════════════════════════════════════════════════════

/**
 * The model calls this when a user asks for a document, manual or repair guide
 * to be sent to them. The handler returns one of four fixed sentences; agent
 * prompts tell the model to relay them as-is.
 */

import { buildDocumentNotification } from "../services/document-payload.service";
import { sendDocumentNotification } from "../services/webhook-dispatcher.service";
import { WebhookConfig } from "../utils/config";
import { AgentTool, DispatchResult } from "../utils/types";

export const SEND_DOCUMENT_TOOL_NAME = "send_document";

export function describeDispatchResult(result: DispatchResult): string {
  switch (result.kind) {
    case "delivered":
      return `Document '${result.title}' has been sent successfully.`;
    case "timed_out":
      return "Failed to send document: the request timed out.";
    case "unreachable":
      return "Failed to send document: could not reach the delivery service.";
    case "rejected":
      return `Failed to send document: received status ${result.status}.`;
  }
}

function stringArg(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  return typeof value === "string" ? value : "";
}

export function createSendDocumentTool(config: WebhookConfig): AgentTool {
  return {
    schema: {
      name: SEND_DOCUMENT_TOOL_NAME,
      description:
        "Send a document URL to the user. Use this when the user asks you to send, " +
        "share, or deliver a document, PDF, manual, repair guide, or any file link.",
      parameters: {
        title: {
          type: "string",
          description: 'Document title (e.g., "Kubota SVL97-2 Repair Guide")',
        },
        url: {
          type: "string",
          description: "Full URL to the document",
        },
        recipient: {
          type: "string",
          description: "Optional recipient identifier (email, phone, or user ID)",
        },
      },
      required: ["title", "url"],
    },
    handler: async (args, ctx) => {
      const notification = buildDocumentNotification(
        stringArg(args, "title"),
        stringArg(args, "url"),
        stringArg(args, "recipient")
      );
      const result = await sendDocumentNotification(config, notification, {
        reqId:  ctx.reqId,
        signal: ctx.signal,
      });
      return describeDispatchResult(result);
    },
  };
}
