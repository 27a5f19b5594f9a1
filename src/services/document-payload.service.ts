// ═════════════════════════════════════════════════════════════════════════════
// DOCUMENT PAYLOAD SERVICE — Build the document-notification event
// ═════════════════════════════════════════════════════════════════════════════

import { DocumentNotification } from "../utils/types";

/**
 * Formats a date as ISO-8601 UTC with an explicit "+00:00" offset instead of "Z",
 * e.g. 2026-02-06T16:30:00.000+00:00
 */
export function toUtcOffsetIso(date: Date): string {
  return date.toISOString().replace(/Z$/, "+00:00");
}

/**
 * Assembles the notification posted to the document webhook.
 * Fields pass through verbatim; the URL is not validated or normalized.
 *
 * @param now - Clock reading for the timestamp; defaults to the current time
 */
export function buildDocumentNotification(
  title: string,
  url: string,
  recipient = "",
  now: Date = new Date()
): DocumentNotification {
  return Object.freeze({
    title,
    url,
    recipient,
    timestamp: toUtcOffsetIso(now),
  });
}
