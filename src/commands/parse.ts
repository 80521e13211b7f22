import { writeFileSync } from "node:fs";
import { resolveParseOptions, type ParseFlags } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import type { ParseResult } from "../parsers/types.js";
import { createPipeline, readTimesheetFile, type GlobalFlags } from "./pipeline.js";

export interface ParseCommandOptions extends ParseFlags, GlobalFlags {
  output?: string;
}

export async function parse(file: string, options: ParseCommandOptions = {}): Promise<void> {
  const { config, parser } = createPipeline(options);

  let result: ParseResult;
  try {
    const parseOptions = resolveParseOptions(options, config);
    result = await parser.parseTimesheet(readTimesheetFile(file), parseOptions);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  const json = JSON.stringify(result, null, 2);
  if (options.output) {
    writeFileSync(options.output, json + "\n", "utf-8");
    console.log(
      `Parsed: ${result.successRows}/${result.totalRows} row${result.totalRows !== 1 ? "s" : ""} → ${options.output}`
    );
  } else {
    console.log(json);
  }
}
