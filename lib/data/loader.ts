/**
 * Load a user's config.json and ledger.csv from their data directory.
 */

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import type { PlannerConfig, Transaction } from "@/lib/types/zod";
import { ConfigFileSchema } from "@/lib/types/zod";
import { DataFileNotFoundError, DataFormatError } from "@/lib/model/errors";
import { parseLedgerCsv } from "./ledger";

export const CONFIG_FILE = "config.json";
export const LEDGER_FILE = "ledger.csv";

export interface UserData {
  config: PlannerConfig;
  transactions: Transaction[];
}

function readRequired(filePath: string, label: string): string {
  if (!existsSync(filePath)) {
    throw new DataFileNotFoundError(filePath, `${label} file not found: ${filePath}`);
  }
  return readFileSync(filePath, "utf8");
}

/** Parse config.json content; throws DataFormatError on bad JSON or shape. */
export function parseConfig(text: string, source = CONFIG_FILE): PlannerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataFormatError(`${source}: not valid JSON (${reason})`);
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    console.error("[Loader] Invalid config:", parsed.error.issues);
    const issue = parsed.error.issues[0];
    throw new DataFormatError(
      `${source}: ${issue?.path.join(".") || "config"}: ${issue?.message ?? "invalid config"}`
    );
  }
  return parsed.data;
}

export function loadConfig(userDir: string): PlannerConfig {
  const filePath = path.join(userDir, CONFIG_FILE);
  return parseConfig(readRequired(filePath, "Config"), filePath);
}

export function loadLedger(userDir: string): Transaction[] {
  const filePath = path.join(userDir, LEDGER_FILE);
  return parseLedgerCsv(readRequired(filePath, "Ledger"), filePath);
}

export function loadUserData(userDir: string): UserData {
  return { config: loadConfig(userDir), transactions: loadLedger(userDir) };
}
