#!/usr/bin/env node
/**
 * SIU^S12 batch driver.
 *
 * Usage: siu-s12-parse <input.hl7>
 *
 * Prints one JSON appointment record per message on stdout and one JSON error
 * object per failed message on stderr. A failed message never stops the
 * batch.
 *
 * Exit codes: 0 all messages parsed, 1 no messages found or any message
 * failed, 2 usage error or unreadable input file.
 */

import { readFile } from "fs/promises";
import { splitMessages } from "./hl7v2/split";
import { parseMessage } from "./hl7v2/parser";
import { HL7Error } from "./hl7v2/errors";
import { parseSiuS12Appointment } from "./siu-to-appointment/messages/siu-s12";
import { extractOptionsFor, siuToAppointmentConfig } from "./siu-to-appointment/config";
import type { AppointmentRecord, SiuS12ExtractOptions } from "./siu-to-appointment/types";
import { createLogger } from "./logger";

export const USAGE = "Usage: siu-s12-parse <input.hl7>";
export const NO_MESSAGES = "No HL7 messages found (no MSH segments).";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

const log = createLogger("SIU");

export interface CliOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

/** Error line written to stderr for a message that could not be extracted */
export interface MessageFailure {
  /** 1-based position of the message in the input file */
  message_index: number;
  error: string;
  detail: string;
}

export type MessageOutcome =
  | { index: number; ok: true; record: AppointmentRecord }
  | { index: number; ok: false; failure: MessageFailure };

const consoleOutput: CliOutput = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

/**
 * Parses and extracts every message of a batch independently.
 * HL7Error is recorded per message; anything else propagates.
 */
export function processBatch(messages: readonly string[], options: SiuS12ExtractOptions = {}): MessageOutcome[] {
  return messages.map((raw, i): MessageOutcome => {
    const index = i + 1;
    try {
      const record = parseSiuS12Appointment(parseMessage(raw), options);
      log.debug(`Message ${index}: appointment ${record.appointment_id || "(no id)"}`);
      return { index, ok: true, record };
    } catch (error) {
      if (!(error instanceof HL7Error)) throw error;
      log.debug(`Message ${index}: ${error.name}: ${error.message}`);
      return {
        index,
        ok: false,
        failure: { message_index: index, error: error.name, detail: error.message },
      };
    }
  });
}

/**
 * Runs the driver over a file path and returns the process exit code.
 */
export async function main(
  args: readonly string[],
  output: CliOutput = consoleOutput,
  options?: SiuS12ExtractOptions,
): Promise<number> {
  const [path] = args;
  if (args.length !== 1 || path === undefined) {
    output.stderr(USAGE);
    return EXIT_USAGE;
  }

  let raw: string;
  try {
    // invalid UTF-8 sequences decode to U+FFFD rather than failing the file
    raw = (await readFile(path)).toString("utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error reading file";
    output.stderr(`Failed to read ${path}: ${message}`);
    return EXIT_USAGE;
  }

  const messages = splitMessages(raw);
  if (messages.length === 0) {
    output.stderr(NO_MESSAGES);
    return EXIT_FAILED;
  }

  log.info(`Found ${messages.length} message(s) in ${path}`);

  const extractOptions = options ?? extractOptionsFor(siuToAppointmentConfig(), "SIU-S12");
  const outcomes = processBatch(messages, extractOptions);

  for (const outcome of outcomes) {
    if (outcome.ok) {
      output.stdout(JSON.stringify(outcome.record));
    } else {
      output.stderr(JSON.stringify(outcome.failure));
    }
  }

  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  log.info(`Parsed ${outcomes.length - failed} of ${outcomes.length} message(s)`);

  return failed > 0 ? EXIT_FAILED : EXIT_OK;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log.error("Unexpected failure:", error);
      process.exitCode = EXIT_FAILED;
    });
}
