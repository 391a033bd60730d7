#!/usr/bin/env tsx
/**
 * mailstash: files stored as attachments in an IMAP mailbox.
 *
 * Every command prints structured JSON to stdout:
 *   { ok: true, data: ... }
 *   { ok: false, error: "...", kind: "..." }
 *
 * Usage:
 *   mailstash list [remote-folder] [--recurse] [--max-depth N] [--long]
 *   mailstash download <remote> <local>
 *   mailstash upload <local> [--folder PATH] [--start-part N] [--reject-existing]
 *   mailstash remove <remote>
 *   mailstash list-folders
 */

import { DEFAULTS, UsageError, messageOf } from "@mailstash/shared";
import { resolveSettings } from "../config/settings.js";
import { Logger } from "../logger.js";
import { ImapTransport } from "../transport/imap-transport.js";
import { isCommand, parseArgs } from "./args.js";
import { helpData, runCommand } from "./commands.js";
import { failurePayload, successPayload } from "./output.js";

// ── JSON output helpers ─────────────────────────────────────────────

function ok(data: unknown): void {
  process.stdout.write(JSON.stringify(successPayload(data)) + "\n");
  process.exitCode = 0;
}

function fail(err: unknown, debug: boolean): void {
  process.stdout.write(JSON.stringify(failurePayload(err, debug)) + "\n");
  process.exitCode = 1;
}

async function main(argv: string[]): Promise<void> {
  let debug = argv.includes("--debug");

  try {
    const parsed = parseArgs(argv);
    debug = parsed.flags.debug === "true";

    if (parsed.command === "help") {
      ok(helpData());
      return;
    }
    if (!isCommand(parsed.command)) {
      throw new UsageError(`Unknown command "${parsed.command}". Run: mailstash help`);
    }

    const settings = await resolveSettings({
      credentialsPath: parsed.flags.credentials,
      baseFolder: parsed.flags.root,
      trashFolder: parsed.flags.trash,
    });
    const logger = await Logger.create({
      level: debug ? "debug" : DEFAULTS.logLevel,
      logDir: settings.logDir ?? undefined,
    });

    const transport = await ImapTransport.connect({
      credentials: settings.credentials,
      folderSeparator: settings.drive.folderSeparator,
      timeoutMs: settings.timeoutMs,
      trashFolder: settings.trashFolder,
      logger,
    });

    let data: unknown;
    try {
      await transport.createFolder(settings.drive.baseFolder);
      data = await runCommand({ transport, config: settings.drive, logger }, parsed);
    } finally {
      await transport.close().catch((err: unknown) => logger.warn(`Logout failed: ${messageOf(err)}`));
    }
    ok(data);
  } catch (err) {
    fail(err, debug);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  fail(err, true);
});
