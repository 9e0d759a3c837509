import path from "node:path";

import iconv from "iconv-lite";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export const DEFAULT_TEXT_ENCODING = "windows-1252";

export const hashString = (value: string) => {
  let hash = FNV_OFFSET;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = (hash * FNV_PRIME) >>> 0;
  }
  return hash.toString(16).padStart(8, "0");
};

export const bytesToBase64 = (bytes: Uint8Array) => Buffer.from(bytes).toString("base64");

export const encodeText = (text: string, encoding: string = DEFAULT_TEXT_ENCODING) =>
  new Uint8Array(iconv.encode(text, encoding));

export const decodeText = (bytes: Uint8Array, encoding: string = DEFAULT_TEXT_ENCODING) =>
  iconv.decode(Buffer.from(bytes), encoding);

export const toPosixPath = (value: string) => value.split(path.sep).join("/");

export const isDirectoryPath = (value: string) =>
  value.endsWith("/") || value.endsWith(path.sep);

export const replaceExtension = (filePath: string, extension: string) => {
  const current = path.extname(filePath);
  return `${filePath.slice(0, filePath.length - current.length)}${extension}`;
};

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const pad2 = (value: number) => String(value).padStart(2, "0");

/**
 * Formats a date as `Tue, 02 Jan 2024 03:04:05 +01:00`. The offset defaults to
 * the local time zone at that instant.
 */
export const formatMimeDate = (
  date: Date,
  offsetMinutes: number = -date.getTimezoneOffset()
) => {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const absolute = Math.abs(offsetMinutes);
  const zone = `${sign}${pad2(Math.floor(absolute / 60))}:${pad2(absolute % 60)}`;
  return (
    `${WEEKDAYS[shifted.getUTCDay()]}, ${pad2(shifted.getUTCDate())} ` +
    `${MONTHS[shifted.getUTCMonth()]} ${shifted.getUTCFullYear()} ` +
    `${pad2(shifted.getUTCHours())}:${pad2(shifted.getUTCMinutes())}:` +
    `${pad2(shifted.getUTCSeconds())} ${zone}`
  );
};
