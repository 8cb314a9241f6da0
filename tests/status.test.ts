import assert from "node:assert/strict";
import { describe, it } from "node:test";

import {
  delayAheadMarker,
  escapeHtml,
  formatAttachment,
  formatDelayAhead,
  formatProjectBlock,
  formatStatusReport,
  formatUpdateDate,
  NEGATIVE_MARKER,
  NON_NEGATIVE_MARKER,
  packBlocks,
  splitMessage,
  TELEGRAM_MESSAGE_LIMIT,
} from "../lib/status";

const ROW = {
  "Project Name": "Bridge Retrofit",
  Actual: "45%",
  Planned: "50%",
  Status: "On Track",
  Increment: "5%",
  "Delay/Ahead": "-15 days",
  "Update Progress": "2024-03-05 14:30:00",
  Attachment: "https://example.com/report.pdf",
};

describe("delay/ahead marker", () => {
  it("marks values with a minus as negative", () => {
    assert.equal(delayAheadMarker("-15 days"), NEGATIVE_MARKER);
    assert.equal(formatDelayAhead("-15 days"), "🔴 <b>-15 days</b>");
  });

  it("marks signed and unsigned positives as non-negative", () => {
    assert.equal(formatDelayAhead("+5 days"), "🟢 <b>+5 days</b>");
    assert.equal(formatDelayAhead("5 days"), "🟢 <b>5 days</b>");
  });

  it("treats minus zero as non-negative", () => {
    assert.equal(delayAheadMarker("-0 days"), NON_NEGATIVE_MARKER);
  });

  it("renders no marker when there are no digits", () => {
    assert.equal(formatDelayAhead("N/A"), "<b>N/A</b>");
    assert.equal(formatDelayAhead(""), "<b></b>");
  });

  it("takes any hyphen as the sign", () => {
    assert.equal(delayAheadMarker("on-time 3 days"), NEGATIVE_MARKER);
  });
});

describe("formatUpdateDate", () => {
  it("reformats the sheet timestamp", () => {
    assert.equal(formatUpdateDate("2024-03-05 14:30:00"), "05 Mar 2024");
    assert.equal(formatUpdateDate("2023-12-31 23:59:59"), "31 Dec 2023");
  });

  it("passes anything else through unchanged", () => {
    for (const raw of ["05/03/2024", "2023-02-30 10:00:00", "2024-13-01 00:00:00", "2024-01-01 24:00:00", "yesterday"]) {
      assert.equal(formatUpdateDate(raw), raw);
    }
  });
});

describe("formatAttachment", () => {
  it("links http values and shows N/A otherwise", () => {
    assert.equal(
      formatAttachment("https://example.com/a?x=1&y=2"),
      '<a href="https://example.com/a?x=1&amp;y=2">View Report</a>',
    );
    assert.equal(formatAttachment("shared drive"), "N/A");
    assert.equal(formatAttachment(""), "N/A");
  });
});

describe("formatProjectBlock", () => {
  it("renders every field", () => {
    assert.equal(
      formatProjectBlock(ROW),
      [
        "▫️ <b>Bridge Retrofit</b>",
        "   • Actual: <b>45%</b>",
        "   • Planned: <b>50%</b>",
        "   • Status: <b>On Track</b>",
        "   • Increment: <b>5%</b>",
        "   • Delay/Ahead: 🔴 <b>-15 days</b>",
        "   • Last Updated: <b>05 Mar 2024</b>",
        '   • Attachment: <a href="https://example.com/report.pdf">View Report</a>',
      ].join("\n"),
    );
  });

  it("keeps an unparseable timestamp as written", () => {
    const block = formatProjectBlock({ ...ROW, "Update Progress": "last Tuesday" });
    assert.match(block, /^ {3}• Last Updated: <b>last Tuesday<\/b>$/m);
  });

  it("fills missing columns with N/A and escapes cell text", () => {
    const block = formatProjectBlock({ "Project Name": "Pier <B> & Co" });
    assert.equal(
      block,
      [
        "▫️ <b>Pier &lt;B&gt; &amp; Co</b>",
        "   • Actual: <b>N/A</b>",
        "   • Planned: <b>N/A</b>",
        "   • Status: <b>N/A</b>",
        "   • Increment: <b>N/A</b>",
        "   • Delay/Ahead: <b>N/A</b>",
        "   • Last Updated: <b>N/A</b>",
        "   • Attachment: N/A",
      ].join("\n"),
    );
  });
});

describe("formatStatusReport", () => {
  it("joins blocks under the header", () => {
    const messages = formatStatusReport([ROW, { ...ROW, "Project Name": "Depot", "Delay/Ahead": "+5 days" }]);
    assert.equal(messages.length, 1);
    const blocks = messages[0].split("\n\n");
    assert.equal(blocks.length, 3);
    assert.equal(blocks[0], "📊 Current Project Status:");
    assert.match(blocks[2], /Delay\/Ahead: 🟢 <b>\+5 days<\/b>/);
  });

  it("lists every row even when one is malformed", () => {
    const [report] = formatStatusReport([
      { "Project Name": "Broken", "Delay/Ahead": "??", "Update Progress": "2024-99-99 99:99:99" },
      ROW,
    ]);
    assert.match(report, /Last Updated: <b>2024-99-99 99:99:99<\/b>/);
    assert.match(report, /<b>Bridge Retrofit<\/b>/);
  });

  it("says so when the sheet is empty", () => {
    assert.deepEqual(formatStatusReport([]), ["📊 Current Project Status:\n\n📭 No projects found."]);
  });

  it("splits a long listing between projects, even when a cell has blank lines", () => {
    const rows = Array.from({ length: 30 }, (_, i) => ({
      ...ROW,
      "Project Name": `Project ${i + 1}`,
      Status: `Phase 1 done${"x".repeat(6)}\n\nPhase 2 pending`,
    }));
    const messages = formatStatusReport(rows);

    assert.ok(messages.length > 1);
    for (const message of messages) {
      assert.ok(message.length <= TELEGRAM_MESSAGE_LIMIT);
      assert.equal(count(message, "<b>"), count(message, "</b>"));
      assert.equal(count(message, "<a "), count(message, "</a>"));
    }
    assert.equal(count(messages.join(""), "▫️ <b>Project "), 30);
  });
});

function count(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

describe("packBlocks", () => {
  it("keeps whole blocks together under the limit", () => {
    assert.deepEqual(packBlocks(["<b>a</b>", "<b>b</b>", "<b>c</b>"], 18), ["<b>a</b>\n\n<b>b</b>", "<b>c</b>"]);
  });

  it("sends an oversized block as escaped plain text", () => {
    assert.deepEqual(packBlocks(["<b>a&amp;b</b>", "<b>cdefgh</b>"], 8), ["a&amp;b", "cdefgh"]);
  });

  it("never cuts inside an entity", () => {
    assert.deepEqual(packBlocks(["<b>ab&amp;</b>"], 6), ["ab", "&amp;"]);
  });
});

describe("splitMessage", () => {
  it("keeps short text whole", () => {
    assert.deepEqual(splitMessage("a\n\nb", 10), ["a\n\nb"]);
  });

  it("splits on blank lines under the limit", () => {
    assert.deepEqual(splitMessage("aaaa\n\nbbbb\n\ncccc", 10), ["aaaa\n\nbbbb", "cccc"]);
  });

  it("hard-cuts a block longer than the limit", () => {
    assert.deepEqual(splitMessage("abcdefghij\n\nk", 4), ["abcd", "efgh", "ij", "k"]);
  });
});

describe("escapeHtml", () => {
  it("escapes the characters Telegram's HTML mode reserves", () => {
    assert.equal(escapeHtml(`<a href="x">&</a>`), "&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;");
  });
});
