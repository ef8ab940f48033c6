import fs from "node:fs/promises";
import path from "node:path";
import iconv from "iconv-lite";
import { ArtifactNotFoundError, DecodingFailureError } from "./errors.js";

export type TextEncodingName = "utf-8" | "windows-1252";

export type DecodeResult =
  | { ok: true; lines: string[]; encoding: TextEncodingName }
  | { ok: false; error: DecodingFailureError };

// Byte values windows-1252 leaves unassigned. The codec maps them instead of
// failing, so they are checked up front.
const CP1252_UNDEFINED = new Set([0x81, 0x8d, 0x8f, 0x90, 0x9d]);

export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function tryUtf8(bytes: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    // Not valid UTF-8; the caller falls back to windows-1252.
    return null;
  }
}

function tryWindows1252(bytes: Uint8Array): string | null {
  for (const b of bytes) {
    if (CP1252_UNDEFINED.has(b)) return null;
  }
  return iconv.decode(Buffer.from(bytes), "win1252");
}

/** Decodes as UTF-8, then as windows-1252. Never throws. */
export function decodeLines(bytes: Uint8Array, filePath = "<buffer>"): DecodeResult {
  const utf8 = tryUtf8(bytes);
  if (utf8 !== null) return { ok: true, lines: splitLines(utf8), encoding: "utf-8" };

  const legacy = tryWindows1252(bytes);
  if (legacy !== null) return { ok: true, lines: splitLines(legacy), encoding: "windows-1252" };

  return { ok: false, error: new DecodingFailureError(filePath) };
}

export function resolveArtifactPath(basePath: string, fileName: string): string | null {
  const base = path.resolve(basePath);
  const resolved = path.resolve(base, fileName);
  if (resolved === base || !resolved.startsWith(base + path.sep)) return null;
  return resolved;
}

/** Reads raw bytes of an artifact under basePath. Missing or unreadable files raise ArtifactNotFoundError. */
export async function readArtifactBytes(basePath: string, fileName: string): Promise<Buffer> {
  const filePath = resolveArtifactPath(basePath, fileName);
  if (!filePath) throw new ArtifactNotFoundError(path.join(basePath, fileName));
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new ArtifactNotFoundError(filePath, { cause: err });
  }
}

export async function readArtifactLines(basePath: string, fileName: string): Promise<DecodeResult> {
  const bytes = await readArtifactBytes(basePath, fileName);
  return decodeLines(bytes, path.join(basePath, fileName));
}
