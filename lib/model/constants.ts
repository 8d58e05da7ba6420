/**
 * Default constants for the cash flow simulation.
 */

/** Width (days) of the stress-test projection run after each month-end. */
export const LOOKAHEAD_DAYS = 30;

/** Simulation window used when the CLI is not given --window. */
export const DEFAULT_WINDOW_DAYS = 60;

/** Description marking a sweep injected by the simulation. Reporters match on it. */
export const SURPLUS_TRANSFER_DESCRIPTION = "Surplus Transfer";

/** Category assigned to simulation-generated transfers. */
export const SYSTEM_CATEGORY = "System";

/** Base directory holding one folder per user (config.json + ledger.csv). */
export const DEFAULT_DATA_DIR = "./users";
