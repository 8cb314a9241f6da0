/**
 * Status listing: one HTML block per project row.
 *
 * Every field is formatted on its own and never throws, so one malformed row
 * cannot take the whole listing down.
 */

import type { ProjectRecord } from "./sheets";

export const STATUS_HEADER = "📊 Current Project Status:";
export const NO_PROJECTS_TEXT = "📭 No projects found.";
export const NOT_AVAILABLE = "N/A";

export const NEGATIVE_MARKER = "🔴";
export const NON_NEGATIVE_MARKER = "🟢";

/** Telegram rejects messages longer than this. */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

const SHEET_TIMESTAMP = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * "2024-03-05 14:30:00" -> "05 Mar 2024". Anything that is not a real
 * calendar date and time in that shape comes back unchanged.
 */
export function formatUpdateDate(raw: string): string {
  const m = SHEET_TIMESTAMP.exec(raw);
  if (!m) return raw;
  const [year, month, day, hh, mm, ss] = m.slice(1).map(Number);
  if (hh > 23 || mm > 59 || ss > 59 || month < 1 || month > 12) return raw;

  // Reject 2023-02-30 and friends
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCDate() !== day || probe.getUTCMonth() !== month - 1) {
    return raw;
  }
  return `${String(day).padStart(2, "0")} ${MONTHS[month - 1]} ${year}`;
}

/**
 * Digits give the magnitude; a literal "-" anywhere gives the sign.
 * No digits at all means no marker.
 */
export function delayAheadMarker(raw: string): string | undefined {
  const digits = raw.replace(/\D/g, "");
  if (!digits) return undefined;
  let value = Number(digits);
  if (raw.includes("-")) value = -value;
  return value < 0 ? NEGATIVE_MARKER : NON_NEGATIVE_MARKER;
}

export function formatDelayAhead(raw: string): string {
  const marker = delayAheadMarker(raw);
  const bold = `<b>${escapeHtml(raw)}</b>`;
  return marker ? `${marker} ${bold}` : bold;
}

export function formatAttachment(raw: string): string {
  if (raw.startsWith("http")) {
    return `<a href="${escapeHtml(raw)}">View Report</a>`;
  }
  return NOT_AVAILABLE;
}

function field(record: ProjectRecord, title: string): string {
  return Object.prototype.hasOwnProperty.call(record, title)
    ? record[title]
    : NOT_AVAILABLE;
}

export function formatProjectBlock(record: ProjectRecord): string {
  const bold = (title: string) => `<b>${escapeHtml(field(record, title))}</b>`;

  const updated = record["Update Progress"];
  const lastUpdated = updated ? formatUpdateDate(updated) : NOT_AVAILABLE;

  return [
    `▫️ ${bold("Project Name")}`,
    `   • Actual: ${bold("Actual")}`,
    `   • Planned: ${bold("Planned")}`,
    `   • Status: ${bold("Status")}`,
    `   • Increment: ${bold("Increment")}`,
    `   • Delay/Ahead: ${formatDelayAhead(field(record, "Delay/Ahead"))}`,
    `   • Last Updated: <b>${escapeHtml(lastUpdated)}</b>`,
    `   • Attachment: ${formatAttachment(record["Attachment"] ?? "")}`,
  ].join("\n");
}

/**
 * The listing as one or more HTML messages, each under `limit`.
 */
export function formatStatusReport(
  records: ProjectRecord[],
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): string[] {
  if (!records.length) return [`${STATUS_HEADER}\n\n${NO_PROJECTS_TEXT}`];
  return packBlocks([STATUS_HEADER, ...records.map(formatProjectBlock)], limit);
}

/**
 * Join HTML blocks with blank lines into messages under `limit`. A block is
 * never split across messages, so every message keeps its tags balanced. A
 * block longer than `limit` on its own goes out as escaped plain text, cut
 * between characters.
 */
export function packBlocks(blocks: readonly string[], limit: number): string[] {
  const out: string[] = [];
  let current = "";
  for (const block of blocks) {
    const pieces = block.length <= limit ? [block] : cutPlainText(block, limit);
    for (const piece of pieces) {
      const candidate = current ? `${current}\n\n${piece}` : piece;
      if (candidate.length <= limit) {
        current = candidate;
        continue;
      }
      if (current) out.push(current);
      current = piece;
    }
  }
  if (current) out.push(current);
  return out;
}

function unescapeHtml(text: string): string {
  return text
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&");
}

function cutPlainText(html: string, limit: number): string[] {
  const plain = unescapeHtml(html.replace(/<[^>]*>/g, ""));
  const out: string[] = [];
  let current = "";
  for (const ch of plain) {
    const escaped = escapeHtml(ch);
    if (current && current.length + escaped.length > limit) {
      out.push(current);
      current = "";
    }
    current += escaped;
  }
  if (current) out.push(current);
  return out;
}

/**
 * Split plain text on blank lines so every chunk stays under `limit`. A
 * single block longer than the limit is hard-cut.
 */
export function splitMessage(
  text: string,
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): string[] {
  if (text.length <= limit) return [text];

  const out: string[] = [];
  let current = "";
  for (const block of text.split("\n\n")) {
    const candidate = current ? `${current}\n\n${block}` : block;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }
    if (current) out.push(current);
    let rest = block;
    while (rest.length > limit) {
      out.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }
  if (current) out.push(current);
  return out;
}
