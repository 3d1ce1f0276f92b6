import { describe, it, expect } from "vitest";
import { buildRegistrationMessage, buildResultMessage, decodeFrame, interpretMessage } from "./messages.js";

describe("interpretMessage", () => {
  it("accepts a ping command", () => {
    expect(interpretMessage({ type: "command", command: "ping", target: "192.0.2.10" })).toEqual({
      type: "command",
      command: { kind: "ping", target: "192.0.2.10" },
      target: "192.0.2.10",
    });
  });

  it("runs the trimmed target but keeps the target as received for the reply", () => {
    expect(interpretMessage({ type: "command", command: "tracert", target: " example.test " })).toEqual({
      type: "command",
      command: { kind: "tracert", target: " example.test " },
      target: "example.test",
    });
  });

  it("accepts an IPv6 target", () => {
    expect(interpretMessage({ type: "command", command: "ping", target: "2001:db8::1" })).toMatchObject({
      type: "command",
      target: "2001:db8::1",
    });
  });

  it("ignores other message types", () => {
    expect(interpretMessage({ type: "status" })).toEqual({
      type: "ignored",
      reason: "unknown message type: status",
    });
  });

  it("ignores unsupported command kinds", () => {
    expect(interpretMessage({ type: "command", command: "nslookup", target: "example.test" })).toEqual({
      type: "ignored",
      reason: "unsupported command: nslookup",
    });
  });

  it("ignores command messages without a command name", () => {
    expect(interpretMessage({ type: "command", target: "example.test" })).toEqual({
      type: "ignored",
      reason: "command message has no command name",
    });
  });

  it("rejects a command without a target", () => {
    expect(interpretMessage({ type: "command", command: "ping" })).toEqual({
      type: "rejected",
      command: { kind: "ping", target: "" },
      reason: "missing",
    });
  });

  it("rejects a blank target and keeps it as received", () => {
    expect(interpretMessage({ type: "command", command: "ping", target: "   " })).toEqual({
      type: "rejected",
      command: { kind: "ping", target: "   " },
      reason: "empty",
    });
  });

  it("rejects a target longer than a host name can be", () => {
    const target = "a".repeat(254);
    expect(interpretMessage({ type: "command", command: "tracert", target })).toEqual({
      type: "rejected",
      command: { kind: "tracert", target },
      reason: "longer than 253 characters",
    });
  });

  it("rejects a target that would be read as a command-line switch", () => {
    expect(interpretMessage({ type: "command", command: "ping", target: "-t" })).toEqual({
      type: "rejected",
      command: { kind: "ping", target: "-t" },
      reason: "starts with '-'",
    });
  });

  it("rejects a target with shell or whitespace characters", () => {
    expect(interpretMessage({ type: "command", command: "ping", target: "example.test & calc" })).toEqual({
      type: "rejected",
      command: { kind: "ping", target: "example.test & calc" },
      reason: "contains characters other than letters, digits, '.', ':', '_' and '-'",
    });
  });

  it("rejects a target that is not a string and replies with an empty target", () => {
    expect(interpretMessage({ type: "command", command: "ping", target: 42 })).toMatchObject({
      type: "rejected",
      command: { kind: "ping", target: "" },
    });
  });

  it("ignores payloads that are not objects", () => {
    expect(interpretMessage([1, 2, 3])).toEqual({
      type: "ignored",
      reason: "message is not an object with a type",
    });
  });
});

describe("decodeFrame", () => {
  it("throws on invalid JSON", () => {
    expect(() => decodeFrame("{not json")).toThrow(SyntaxError);
  });
});

describe("outbound messages", () => {
  it("builds the registration message", () => {
    expect(buildRegistrationMessage({ agreementId: "7712345", city: "Москва", os: "Linux", hostname: "probe-1" })).toEqual({
      type: "registration",
      data: { agreement_id: "7712345", city: "Москва", os: "Linux", hostname: "probe-1" },
    });
  });

  it("builds the result message", () => {
    expect(JSON.stringify(buildResultMessage(
      { agreementId: "7712345", city: "Москва" },
      { kind: "ping", target: "192.0.2.10" },
      "Error: Could not parse ping output",
    ))).toBe(
      '{"type":"result","agreement":"7712345","city":"Москва","command":"ping","target":"192.0.2.10","result":"Error: Could not parse ping output"}',
    );
  });
});
