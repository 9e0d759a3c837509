const MAX_LINE_LENGTH = 73;
const SOFT_BREAK = "=\r\n";

export type CharEncoder = (char: string) => Uint8Array;

const escapeByte = (byte: number) => `=${byte.toString(16).toUpperCase().padStart(2, "0")}`;

/**
 * Quoted-printable body encoding. `=` and everything above `~` is escaped;
 * characters beyond U+00FF are escaped byte by byte in the part's charset.
 * Lines are soft-broken after their last space once they reach 73 columns.
 */
export const encodeQuotedPrintable = (text: string, encodeChar: CharEncoder) => {
  if (!text) {
    return "";
  }

  let output = "";
  let lineLength = 0;
  let lastSpace = -1;

  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;

    if (codePoint === 61 || codePoint > 126) {
      if (codePoint <= 255) {
        output += escapeByte(codePoint);
        lineLength += 3;
      } else {
        for (const byte of encodeChar(char)) {
          output += escapeByte(byte);
          lineLength += 3;
        }
      }
    } else {
      output += char;
      lineLength += 1;
      if (codePoint === 32) {
        lastSpace = output.length;
      } else if (codePoint === 10) {
        lineLength = 0;
        lastSpace = -1;
      }
    }

    if (lineLength >= MAX_LINE_LENGTH) {
      if (lastSpace < 0) {
        output += SOFT_BREAK;
        lineLength = 0;
      } else {
        output = output.slice(0, lastSpace) + SOFT_BREAK + output.slice(lastSpace);
        lineLength = output.length - lastSpace - SOFT_BREAK.length;
      }
      lastSpace = -1;
    }
  }

  if (output.endsWith(" ")) {
    output = `${output.slice(0, -1)}=20`;
  }
  return output;
};

/** Reverses {@link encodeQuotedPrintable}, returning the raw bytes. */
export const decodeQuotedPrintable = (encoded: string) => {
  const bytes: number[] = [];
  const body = encoded.replace(/=\r?\n/g, "");
  for (let i = 0; i < body.length; i += 1) {
    const char = body[i] ?? "";
    if (char === "=") {
      const hex = body.slice(i + 1, i + 3);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 2;
        continue;
      }
    }
    bytes.push(body.charCodeAt(i) & 0xff);
  }
  return new Uint8Array(bytes);
};
