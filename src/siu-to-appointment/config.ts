import { readFileSync } from "fs";
import { join } from "path";
import { createLogger } from "../logger";
import type { SiuS12ExtractOptions } from "./types";

/**
 * Configuration for message-type-specific extraction behavior.
 * Config is keyed by message type strings (e.g., "SIU-S12").
 *
 * {
 *   "SIU-S12": {
 *     "extract": { "providerFields": [7, 6, 8, 9], "reasonFields": [7, 8, 6] }
 *   }
 * }
 *
 * A deployment that only trusts PV1-7 and SCH-7 sets both lists to [7].
 */

export type MessageTypeConfig = {
  extract?: SiuS12ExtractOptions;
};

export type SiuToAppointmentConfig = Record<string, MessageTypeConfig | undefined>;

const log = createLogger("CONFIG");

// src/siu-to-appointment or dist/siu-to-appointment -> <package root>/config
const DEFAULT_CONFIG_PATH = join(__dirname, "..", "..", "config", "siu-s12.json");

function getConfigPath(): string {
  return process.env.SIU_TO_APPOINTMENT_CONFIG ?? DEFAULT_CONFIG_PATH;
}

let cachedConfig: SiuToAppointmentConfig | null = null;

/**
 * Returns the extraction configuration (lazy singleton).
 * Config is loaded once at first call and cached for process lifetime.
 *
 * @throws Error if config file is missing, malformed, or contains invalid field lists
 */
export function siuToAppointmentConfig(): SiuToAppointmentConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const configPath = getConfigPath();

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error reading file";
    throw new Error(`Failed to load SIU-to-appointment config from ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error";
    throw new Error(`Failed to parse SIU-to-appointment config as JSON: ${message}`);
  }

  cachedConfig = validateSiuToAppointmentConfig(parsed);
  log.debug(`Loaded config from ${configPath}`);
  return cachedConfig;
}

/**
 * Extraction options for one message type ("SIU-S12"), or {} if unconfigured.
 */
export function extractOptionsFor(
  config: SiuToAppointmentConfig,
  messageType: string,
): SiuS12ExtractOptions {
  return config[messageType]?.extract ?? {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Validates parsed JSON and returns it as a typed config.
 * @throws Error naming the offending path
 */
export function validateSiuToAppointmentConfig(parsed: unknown): SiuToAppointmentConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid SIU-to-appointment config: expected object, got ${describeType(parsed)}`);
  }

  const config: SiuToAppointmentConfig = {};

  for (const [messageType, messageConfig] of Object.entries(parsed)) {
    // Skip null/undefined values (unconfigured message types)
    if (messageConfig === null || messageConfig === undefined) continue;

    if (!isRecord(messageConfig)) {
      throw new Error(
        `Invalid SIU-to-appointment config for ${messageType}: expected object, got ${describeType(messageConfig)}`,
      );
    }

    const extract = messageConfig.extract;
    if (extract === null || extract === undefined) {
      config[messageType] = {};
      continue;
    }

    if (!isRecord(extract)) {
      throw new Error(
        `Invalid SIU-to-appointment config for ${messageType}.extract: expected object, got ${describeType(extract)}`,
      );
    }

    const options: SiuS12ExtractOptions = {};
    const providerFields = readFieldList(extract.providerFields, `${messageType}.extract.providerFields`);
    if (providerFields) options.providerFields = providerFields;
    const reasonFields = readFieldList(extract.reasonFields, `${messageType}.extract.reasonFields`);
    if (reasonFields) options.reasonFields = reasonFields;

    config[messageType] = { extract: options };
  }

  return config;
}

function readFieldList(value: unknown, path: string): number[] | undefined {
  if (value === null || value === undefined) return undefined;

  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(
      `Invalid SIU-to-appointment config for ${path}: ` +
        `expected non-empty array of field numbers, got ${describeType(value)}`,
    );
  }

  return value.map((item: unknown) => {
    if (typeof item !== "number" || !Number.isInteger(item) || item < 1) {
      throw new Error(
        `Invalid field number ${JSON.stringify(item)} in SIU-to-appointment config for ${path}. ` +
          `Field numbers are positive integers.`,
      );
    }
    return item;
  });
}

/**
 * Clears the cached config. Used for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
