import { resolveParseOptions, type ParseFlags } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { checkImport, type ImportCheck } from "../core/import-check.js";
import { formatMoney } from "../core/work-item.js";
import { createPipeline, readTimesheetFile, type GlobalFlags } from "./pipeline.js";

const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

export interface ValidateOptions extends ParseFlags, GlobalFlags {
  json?: boolean;
}

/** Human-readable report of an import check */
export function formatCheck(check: ImportCheck): string {
  const { parseResult } = check;
  const lines: string[] = [];

  lines.push(check.valid ? `${BOLD}✅ Validation Passed${RESET}` : `${BOLD}❌ Validation Failed${RESET}`);
  lines.push(`Format: ${parseResult.format}`);
  lines.push(`Work Items: ${parseResult.workItems.length}`);
  lines.push(`Total Rows: ${parseResult.totalRows}`);
  lines.push(`Success Rows: ${parseResult.successRows}`);
  if (parseResult.errorRows > 0) {
    lines.push(`Error Rows: ${parseResult.errorRows}`);
  }
  lines.push(`Estimated Total: ${formatMoney(check.estimatedTotal)}`);

  if (check.batchError) {
    lines.push("", `Batch: ${check.batchError}`);
  }

  if (check.warnings.length > 0) {
    lines.push("", "⚠️  Warnings:");
    for (const w of check.warnings) lines.push(`  - ${w.message}`);
  }

  if (check.suggestions.length > 0) {
    lines.push("", "💡 Suggestions:");
    for (const s of check.suggestions) lines.push(`  - ${s}`);
  }

  if (parseResult.errors.length > 0) {
    lines.push("", "❌ Errors:");
    for (const e of parseResult.errors) lines.push(`  Line ${e.line}: ${e.message}`);
  }

  return lines.join("\n");
}

export async function validate(file: string, options: ValidateOptions = {}): Promise<void> {
  const { config, logger, validator, parser } = createPipeline(options);

  let check: ImportCheck;
  try {
    const parseOptions = resolveParseOptions(options, config);
    check = await checkImport(parser, validator, logger, readTimesheetFile(file), parseOptions);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  if (options.json) {
    console.log(JSON.stringify(check, null, 2));
  } else {
    console.log(formatCheck(check));
  }

  if (!check.valid) process.exit(1);
}
