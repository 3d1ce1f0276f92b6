import { execFile } from "node:child_process";
import { TextDecoder, promisify } from "node:util";
import type { Logger } from "../logger.js";

const execFileAsync = promisify(execFile);

const CODE_PAGE_ENCODINGS: Readonly<Record<string, string>> = {
  "65001": "utf-8",
  "866": "ibm866",
  "1251": "windows-1251",
  "1252": "windows-1252",
  "936": "gbk",
  "54936": "gb18030",
  "950": "big5",
  "932": "shift_jis",
  "949": "euc-kr",
};

export function codePageToEncoding(codePage?: string): string {
  if (!codePage) {
    return "utf-8";
  }
  return CODE_PAGE_ENCODINGS[codePage] ?? "utf-8";
}

export type CodePageQuery = () => Promise<string>;

export interface ConsoleEncodingOptions {
  readonly logger: Logger;
  readonly platform?: NodeJS.Platform;
  /** Returns the output of `chcp`. */
  readonly queryCodePage?: CodePageQuery;
}

const queryChcp: CodePageQuery = async () => {
  const { stdout } = await execFileAsync("cmd", ["/d", "/s", "/c", "chcp"], {
    windowsHide: true,
    encoding: "utf8",
  });
  return stdout;
};

/**
 * Encoding the OS console tools write with. On Windows this is the active OEM
 * code page reported by `chcp` (cp866 on Russian installs); elsewhere UTF-8.
 * Resolved once at startup so probes never wait on it.
 */
export async function resolveConsoleEncoding(options: ConsoleEncodingOptions): Promise<string> {
  const platform = options.platform ?? process.platform;
  if (platform !== "win32") {
    return "utf-8";
  }

  try {
    const output = await (options.queryCodePage ?? queryChcp)();
    const codePage = output.match(/(\d{3,5})/)?.[1];
    return codePageToEncoding(codePage);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    options.logger.warn({ error: message }, "Could not read console code page, decoding as utf-8");
    return "utf-8";
  }
}

function createDecoder(encoding: string, fatal: boolean): TextDecoder {
  try {
    return new TextDecoder(encoding, { fatal });
  } catch {
    // unknown label
    return new TextDecoder("utf-8", { fatal });
  }
}

/** Decodes process output. Invalid byte sequences become U+FFFD instead of throwing. */
export function decodeOutput(bytes: Uint8Array, encoding: string): string {
  if (bytes.length === 0) {
    return "";
  }

  try {
    return createDecoder(encoding, true).decode(bytes);
  } catch {
    return createDecoder(encoding, false).decode(bytes);
  }
}
