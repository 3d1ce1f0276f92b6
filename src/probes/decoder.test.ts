import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { codePageToEncoding, decodeOutput, resolveConsoleEncoding } from "./decoder.js";

const logger = pino({ level: "silent" });

describe("codePageToEncoding", () => {
  it("maps Windows console code pages to decoder labels", () => {
    expect(codePageToEncoding("866")).toBe("ibm866");
    expect(codePageToEncoding("1251")).toBe("windows-1251");
    expect(codePageToEncoding("65001")).toBe("utf-8");
  });

  it("falls back to utf-8 for missing or unknown code pages", () => {
    expect(codePageToEncoding(undefined)).toBe("utf-8");
    expect(codePageToEncoding("12345")).toBe("utf-8");
  });
});

describe("decodeOutput", () => {
  it("decodes utf-8 output", () => {
    expect(decodeOutput(Buffer.from("Minimum = 10ms", "utf8"), "utf-8")).toBe("Minimum = 10ms");
  });

  it("decodes cp866 output from a Russian console", () => {
    const bytes = Buffer.from([0x91, 0xe0, 0xa5, 0xa4, 0xad, 0xa5, 0xa5]);
    expect(decodeOutput(bytes, "ibm866")).toBe("Среднее");
  });

  it("replaces invalid sequences instead of throwing", () => {
    expect(decodeOutput(Buffer.from([0x41, 0xff, 0x42]), "utf-8")).toBe("A\uFFFDB");
  });

  it("falls back to utf-8 for an unknown encoding label", () => {
    expect(decodeOutput(Buffer.from("ok", "utf8"), "x-not-an-encoding")).toBe("ok");
  });

  it("returns an empty string for empty output", () => {
    expect(decodeOutput(Buffer.alloc(0), "ibm866")).toBe("");
  });
});

describe("resolveConsoleEncoding", () => {
  it("uses utf-8 without asking the console outside Windows", async () => {
    const queryCodePage = vi.fn(async () => "Active code page: 866");
    await expect(resolveConsoleEncoding({ logger, platform: "linux", queryCodePage })).resolves.toBe("utf-8");
    expect(queryCodePage).not.toHaveBeenCalled();
  });

  it("maps the code page reported by chcp on Windows", async () => {
    const queryCodePage = vi.fn(async () => "Active code page: 866\r\n");
    await expect(resolveConsoleEncoding({ logger, platform: "win32", queryCodePage })).resolves.toBe("ibm866");
  });

  it("falls back to utf-8 when chcp cannot be run", async () => {
    const queryCodePage = vi.fn(async (): Promise<string> => {
      throw new Error("spawn cmd ENOENT");
    });
    await expect(resolveConsoleEncoding({ logger, platform: "win32", queryCodePage })).resolves.toBe("utf-8");
  });
});
