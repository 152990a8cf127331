import { describe, expect, it } from "vitest";
import { Chalk } from "chalk";
import { createTerminalToast, formatToast } from "./terminal-toast.js";

const plain = new Chalk({ level: 0 });

describe("formatToast", () => {
  it("prints title and text with the severity symbol", () => {
    expect(formatToast({ pnotify_type: "success", pnotify_title: "Added", pnotify_text: "Dark" }, plain)).toBe(
      "✓ Added: Dark"
    );
  });

  it("strips markup from the text", () => {
    expect(
      formatToast({ pnotify_title: "Queued", pnotify_text: '<a href="/tv/s/1">s01e02</a> found' }, plain)
    ).toBe("ℹ Queued: s01e02 found");
  });

  it("falls back to info for unknown severities and handles a missing title", () => {
    expect(formatToast({ pnotify_type: "weird", pnotify_text: "hello" }, plain)).toBe("ℹ hello");
  });
});

describe("createTerminalToast", () => {
  it("writes one line per toast", () => {
    const lines: string[] = [];
    const toast = createTerminalToast((line) => lines.push(line), plain);
    toast.show({ pnotify_type: "error", pnotify_title: "Download failed" });
    expect(lines).toEqual(["✗ Download failed"]);
  });
});
