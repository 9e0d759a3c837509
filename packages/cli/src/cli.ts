import { Args, Command, Flags } from "@oclif/core";
import chalk from "chalk";

import { ArchiveBuilder } from "@webfold/lib";
import type { StorageMode } from "@webfold/lib";
import { UniFetchTransport } from "@webfold/uni-fetch";

import {
  OUTPUT_FORMATS,
  STORAGE_FLAGS,
  formatLogLine,
  parseFormat,
  parseProxyUrl,
  parseStorage,
  readEnvConfig,
  resolveOutputPath,
  type OutputFormat
} from "./config";
import { withSpinner } from "./utils/with-spinner";

const saveAs = (
  builder: ArchiveBuilder,
  format: OutputFormat,
  outputPath: string,
  storage: StorageMode,
  url: string
) => {
  switch (format) {
    case "mht":
      return builder.savePageArchive(outputPath, storage, url);
    case "html":
      return builder.savePage(outputPath, url);
    case "complete":
      return builder.savePageComplete(outputPath, url);
    case "text":
      return builder.savePageText(outputPath, url);
  }
};

export default class WebfoldCommand extends Command {
  static description = "Save a web page as an MHT archive, a single HTML file, or plain text.";

  static examples = [
    "<%= config.bin %> https://example.com -o example.mht",
    "<%= config.bin %> https://example.com --format complete -o site/",
    "<%= config.bin %> https://example.com > example.mht"
  ];

  static args = {
    url: Args.string({
      description: "URL of the page to save",
      required: true
    })
  };

  static flags = {
    help: Flags.help({
      char: "h"
    }),
    format: Flags.string({
      char: "f",
      description: "What to write",
      options: [...OUTPUT_FORMATS],
      default: "mht"
    }),
    output: Flags.string({
      char: "o",
      description: "Output file, or a folder ending in / to name the file after the page title"
    }),
    storage: Flags.string({
      description: "Where downloaded resources are kept while an archive is built",
      options: [...STORAGE_FLAGS],
      default: "memory"
    }),
    recursion: Flags.boolean({
      description: "Also download what frames and stylesheets reference",
      default: true,
      allowNo: true
    }),
    "strip-scripts": Flags.boolean({
      description: "Remove <script> elements",
      default: false
    }),
    "strip-iframes": Flags.boolean({
      description: "Remove <iframe> elements",
      default: false
    }),
    "web-mark": Flags.boolean({
      description: 'Prefix saved pages with a "saved from url" comment',
      default: true,
      allowNo: true
    }),
    encoding: Flags.string({
      description: "Text encoding to use instead of the one each response declares"
    }),
    "user-agent": Flags.string({
      description: "User-Agent header sent with every request"
    }),
    proxy: Flags.string({
      description: "HTTP proxy to send requests through; defaults to WEBFOLD_PROXY_URL"
    }),
    "proxy-user": Flags.string({
      description: "Proxy user name; the password is read from WEBFOLD_PROXY_PASSWORD"
    }),
    verbose: Flags.boolean({
      char: "v",
      description: "Print what is fetched and written",
      default: false
    })
  };

  async run() {
    const { args, flags } = await this.parse(WebfoldCommand);
    const targetUrl = args.url;
    const format = parseFormat(flags.format);
    const storage = parseStorage(flags.storage);
    const env = readEnvConfig(process.env);

    const builder = new ArchiveBuilder({
      transport: new UniFetchTransport({
        userAgent: flags["user-agent"],
        timeoutMs: env.timeoutMs,
        headers: env.headers,
        proxyUrl: parseProxyUrl(flags.proxy) ?? env.proxyUrl,
        proxyUsername: flags["proxy-user"],
        proxyPassword: env.proxyPassword
      }),
      textEncoding: flags.encoding,
      addWebMark: flags["web-mark"],
      stripScripts: flags["strip-scripts"],
      stripIframes: flags["strip-iframes"],
      allowRecursion: flags.recursion,
      onLog: flags.verbose
        ? (msg, meta) => this.logToStderr(chalk.dim(formatLogLine(msg, meta)))
        : undefined
    });

    if (format === "mht" && !flags.output) {
      const archive = await withSpinner(() => builder.getPageArchive(targetUrl), {
        start: `Archiving ${targetUrl}`,
        succeed: () => `Archived ${targetUrl} (${builder.warnings.length} warnings)`,
        fail: `Failed to archive ${targetUrl}`
      });
      process.stdout.write(archive);
      this.reportWarnings(builder.warnings);
      return;
    }

    const savedPath = await withSpinner(
      () => saveAs(builder, format, resolveOutputPath(flags.output), storage, targetUrl),
      {
        start: `Saving ${targetUrl} as ${format}`,
        succeed: (saved) => `Saved ${chalk.cyan(saved)}`,
        fail: `Failed to save ${targetUrl}`
      }
    );
    this.reportWarnings(builder.warnings);

    this.log(chalk.green("All done!"));
    this.log(`Output written to ${chalk.cyan(savedPath)}`);
  }

  private reportWarnings(warnings: readonly string[]) {
    for (const warning of warnings) {
      this.logToStderr(chalk.yellow(`Warning: ${warning}`));
    }
  }
}
