import { encodeQuotedPrintable } from "./quoted-printable";
import type { ResourceGraph } from "./resource-graph";
import type { ResourceNode } from "./resource-node";
import type { ArchiveIdentity, FileSystem, LogHandler } from "./types";
import {
  DEFAULT_TEXT_ENCODING,
  bytesToBase64,
  encodeText,
  formatMimeDate
} from "./utils";
import { VERSION } from "./version";

export const MIME_BOUNDARY = "----=_NextPart_000_00";
export const MHT_CONTENT_TYPE = "message/rfc822";

const CRLF = "\r\n";
// 57 bytes encode to one 76-column base64 line.
const BASE64_CHUNK_SIZE = 57;

type EncoderState = "empty" | "header-written" | "finalized";

export type ArchiveEncoderOptions = {
  identity: ArchiveIdentity;
  fs: FileSystem;
  now?: () => Date;
  onLog?: LogHandler;
  onWarning?: (message: string) => void;
};

export class ArchiveEncoder {
  private buffer: string[] = [];
  private state: EncoderState = "empty";

  constructor(private readonly options: ArchiveEncoderOptions) {}

  writeHeader(root: ResourceNode) {
    this.expectState("empty", "write the archive header");
    const { identity } = this.options;
    const now = this.options.now ? this.options.now() : new Date();
    this.line(`From: <Saved by ${identity.user} on ${identity.machine}>`);
    this.line(`Subject: ${root.isHtml ? root.htmlTitle : ""}`);
    this.line(`Date: ${formatMimeDate(now)}`);
    this.line("MIME-Version: 1.0");
    this.line("Content-Type: multipart/related;");
    this.line('\ttype="text/html";');
    this.line(`\tboundary="${MIME_BOUNDARY}"`);
    this.line(`X-MimeOLE: Produced by webfold ${VERSION}`);
    this.line("");
    this.line("This is a multi-part message in MIME format.");
    this.state = "header-written";
  }

  /**
   * Appends one node as a MIME part. Nodes that were never fetched, failed, or
   * were already appended produce nothing.
   */
  async writePart(node: ResourceNode): Promise<void> {
    this.expectState("header-written", "write a part");
    if (node.appended) {
      return;
    }
    if (node.isFetched) {
      if (node.isBinary) {
        this.writeBinaryPart(node);
      } else {
        this.writeTextPart(node);
      }
    }
    node.appended = true;
  }

  writeBoundary() {
    this.expectState("header-written", "write a boundary");
    this.line("");
    this.line(`--${MIME_BOUNDARY}`);
  }

  // The closing boundary carries no trailing "--".
  async writeAll(root: ResourceNode, graph: ResourceGraph): Promise<void> {
    this.writeHeader(root);
    await this.writePart(root);
    for (const node of graph.values()) {
      await this.writePart(node);
    }
    this.writeBoundary();
  }

  finalize(): string {
    this.expectState("header-written", "finalize the archive");
    const text = this.buffer.join("");
    this.buffer = [];
    this.state = "finalized";
    return text;
  }

  /**
   * Writes the archive to `filePath` in the root page's encoding. A failed
   * write is reported as a warning rather than thrown.
   */
  async finalizeToFile(filePath: string, encoding: string = DEFAULT_TEXT_ENCODING) {
    const text = this.finalize();
    try {
      await this.options.fs.write(filePath, encodeText(text, encoding));
      this.options.onLog?.("Archive written", { path: filePath, encoding });
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.options.onLog?.("Failed to write archive", { path: filePath, reason });
      this.options.onWarning?.(`Failed to write archive to ${filePath}: ${reason}`);
      return false;
    }
  }

  private writeTextPart(node: ResourceNode) {
    const encoding = node.textEncoding ?? DEFAULT_TEXT_ENCODING;
    this.writeBoundary();
    this.line(`Content-Type: ${node.contentType};`);
    this.line(`\tcharset="${encoding}"`);
    this.line("Content-Transfer-Encoding: quoted-printable");
    this.line(`Content-Location: ${node.resolvedUrl}`);
    this.line("");
    this.line(encodeQuotedPrintable(node.text, (char) => encodeText(char, encoding)));
  }

  private writeBinaryPart(node: ResourceNode) {
    this.writeBoundary();
    this.line(`Content-Type: ${node.contentType}`);
    this.line("Content-Transfer-Encoding: base64");
    this.line(`Content-Location: ${node.resolvedUrl}`);
    this.line("");
    for (const chunk of base64Lines(node.bytes)) {
      this.line(chunk);
    }
  }

  private line(text: string) {
    this.buffer.push(text, CRLF);
  }

  private expectState(expected: EncoderState, action: string) {
    if (this.state !== expected) {
      throw new Error(`Cannot ${action} while the archive is ${this.state}.`);
    }
  }
}

export const base64Lines = (bytes: Uint8Array) => {
  if (bytes.length === 0) {
    return [""];
  }
  const lines: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += BASE64_CHUNK_SIZE) {
    lines.push(bytesToBase64(bytes.subarray(offset, offset + BASE64_CHUNK_SIZE)));
  }
  return lines;
};
