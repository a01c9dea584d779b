// ABOUTME: Tests for entry, timestamp, and command formatting.
// ABOUTME: Verifies the line grammar including omission of absent fields.

import { describe, it, expect } from "vitest";
import { formatCommand, formatEntry, formatTimestamp } from "./format.js";

describe("formatTimestamp", () => {
  it("formats local time with zero padding", () => {
    const date = new Date(2024, 0, 5, 9, 3, 7);
    expect(formatTimestamp(date)).toBe("2024-01-05 09:03:07");
  });

  it("drops milliseconds", () => {
    const date = new Date(2023, 11, 31, 23, 59, 58, 999);
    expect(formatTimestamp(date)).toBe("2023-12-31 23:59:58");
  });
});

describe("formatEntry", () => {
  const timestamp = "2024-01-05 09:03:07";

  it("emits only timestamp and action when nothing else is given", () => {
    expect(formatEntry({ timestamp, action: "START" })).toBe(
      "[2024-01-05 09:03:07] [START]\n"
    );
  });

  it("appends the command segment", () => {
    expect(formatEntry({ timestamp, action: "CREATE", command: "virsh define vm.xml" })).toBe(
      "[2024-01-05 09:03:07] [CREATE] command: virsh define vm.xml\n"
    );
  });

  it("appends the message after a single space", () => {
    expect(formatEntry({ timestamp, action: "PREPARE", message: "starting VM boot" })).toBe(
      "[2024-01-05 09:03:07] [PREPARE] starting VM boot\n"
    );
  });

  it("places the message after the command", () => {
    expect(
      formatEntry({ timestamp, action: "STOP", command: "virsh shutdown work", message: "requested by user" })
    ).toBe("[2024-01-05 09:03:07] [STOP] command: virsh shutdown work requested by user\n");
  });

  it("treats empty strings as absent", () => {
    expect(formatEntry({ timestamp, action: "START", command: "", message: "" })).toBe(
      "[2024-01-05 09:03:07] [START]\n"
    );
  });
});

describe("formatCommand", () => {
  it("joins arguments with single spaces", () => {
    expect(formatCommand(["echo", "hello", "world"])).toBe("echo hello world");
  });

  it("converts non-string arguments to text", () => {
    expect(formatCommand(["qemu-img", "resize", 20, true])).toBe("qemu-img resize 20 true");
  });

  it("returns an empty string for no arguments", () => {
    expect(formatCommand([])).toBe("");
  });
});
