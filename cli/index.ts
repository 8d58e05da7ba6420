/**
 * Command-line entry: `summarize` (monthly P&L) and `simulator` (daily
 * projection with month-end surplus transfers).
 */

import { writeFileSync } from "node:fs";
import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULT_DATA_DIR, DEFAULT_WINDOW_DAYS } from "@/lib/model/constants";
import { compactDate, formatDateOnly } from "@/lib/model/date-only";
import { simulate } from "@/lib/model/engine";
import { CashflowError } from "@/lib/model/errors";
import { generateSummaryReport } from "@/lib/model/summary";
import { loadUserData } from "@/lib/data/loader";
import { ledgerToCsv } from "@/lib/data/ledger";
import { writeSimulationCsv } from "@/lib/export/simulationToCsv";
import { formatSimulationReport } from "@/lib/report/simulation-report";
import { formatPnlOutput, formatUncategorized } from "@/lib/report/pnl-report";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: cashflow <command> [options]

Commands:
  summarize   Generate a P&L summary for a specific month.
                --user <name>       user directory name (required)
                --month <YYYYMM>    month to summarize (required)
  simulator   Project cash flow over a given time window.
                --user <name>       user directory name (required)
                --window <days>     days to simulate (default: ${DEFAULT_WINDOW_DAYS})

Options:
  --data-dir <dir>  directory holding user folders (default: ${DEFAULT_DATA_DIR})
  -h, --help        show this help`;

const CommonArgsSchema = z.object({
  user: z.string({ required_error: "--user is required" }).min(1, "--user is required"),
  dataDir: z.string().default(DEFAULT_DATA_DIR),
});

const SummarizeArgsSchema = CommonArgsSchema.extend({
  month: z.string({ required_error: "--month is required" }),
});

/** Window range checks belong to the engine (InvalidWindowError). */
const SimulatorArgsSchema = CommonArgsSchema.extend({
  window: z.coerce
    .number({ invalid_type_error: "--window must be a number" })
    .default(DEFAULT_WINDOW_DAYS),
});

type SummarizeArgs = z.infer<typeof SummarizeArgsSchema>;
type SimulatorArgs = z.infer<typeof SimulatorArgsSchema>;

class UsageError extends Error {}

function userDirFor(args: { dataDir: string; user: string }): string {
  return path.join(args.dataDir, args.user);
}

function runSummarize(args: SummarizeArgs, today: string): void {
  const userDir = userDirFor(args);
  const { config, transactions } = loadUserData(userDir);
  const { pnl, uncategorized } = generateSummaryReport(transactions, config, args.month);

  console.log(formatPnlOutput(pnl));

  if (uncategorized.length > 0) {
    console.log(`\n${formatUncategorized(uncategorized)}`);
    const outFile = path.join(userDir, `uncategorized_${compactDate(today)}.csv`);
    writeFileSync(outFile, ledgerToCsv(uncategorized), "utf8");
    console.log(`\nUncategorized transactions saved to: ${outFile}`);
  }
}

function runSimulator(args: SimulatorArgs, today: string): void {
  const userDir = userDirFor(args);
  const { config, transactions } = loadUserData(userDir);

  const result = simulate({
    startBalance: config.currentBalance,
    targetBalance: config.targetBalance,
    transactions: transactions.filter((t) => t.isForecast),
    startDate: today,
    windowDays: args.window,
  });

  console.log(`\n${formatSimulationReport(result, config.targetBalance)}`);

  const outFile = path.join(userDir, `simulation_output_${compactDate(today)}.csv`);
  writeSimulationCsv(outFile, result.days);
  console.log(`\nSimulation results saved to: ${outFile}`);
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

function dispatch(argv: string[], today: string): void {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      user: { type: "string" },
      month: { type: "string" },
      window: { type: "string" },
      "data-dir": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const command = positionals.at(0);
  const extra = positionals.at(1);
  if (command === undefined) throw new UsageError("A command is required");
  if (extra !== undefined) throw new UsageError(`Unexpected argument: ${extra}`);

  const raw = {
    user: values.user,
    month: values.month,
    window: values.window,
    dataDir: values["data-dir"],
  };

  switch (command) {
    case "summarize":
      console.log(`Executing command: ${command}`);
      runSummarize(parseWith(SummarizeArgsSchema, raw), today);
      return;
    case "simulator":
      console.log(`Executing command: ${command}`);
      runSimulator(parseWith(SimulatorArgsSchema, raw), today);
      return;
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Run the CLI with argv (without node/script). Returns the process exit code.
 * `today` is read from the wall clock here and nowhere else.
 */
export function runCli(argv: string[]): number {
  const today = formatDateOnly(new Date());
  try {
    dispatch(argv, today);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (err instanceof CashflowError) {
      console.error(`Error: ${err.message}`);
      return EXIT_ERROR;
    }
    // parseArgs rejects unknown or malformed options with a coded TypeError
    if (err instanceof TypeError && "code" in err && String(err.code).startsWith("ERR_PARSE_ARGS")) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    console.error("[CLI] Unexpected error during run:", err);
    return EXIT_ERROR;
  }
}
