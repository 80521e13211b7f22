import { applyConfigValue, configPath, loadConfig, saveConfig } from "../core/config.js";
import { errorMessage } from "../core/errors.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export async function configShow(): Promise<void> {
  const cfg = loadConfig();

  console.log(`${BOLD}Timesheet Configuration${RESET}`);
  console.log(`${DIM}${configPath()}${RESET}\n`);

  console.log(`  Format:            ${cfg.format}`);
  console.log(`  Continue on error: ${cfg.continueOnError}`);
  console.log(`  Skip empty rows:   ${cfg.skipEmptyRows}`);
  if (cfg.dateFormat) {
    console.log(`  Date format:       ${cfg.dateFormat}`);
  }
  console.log(`  Debug:             ${cfg.debug}`);
  console.log(`  Log file:          ${cfg.logFile}`);
}

export async function configSet(key: string, value: string): Promise<void> {
  try {
    const cfg = applyConfigValue(loadConfig(), key, value);
    saveConfig(cfg);
    console.log(`${key} set to: ${value}`);
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
}
