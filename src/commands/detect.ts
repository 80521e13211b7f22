import { errorMessage } from "../core/errors.js";
import { createPipeline, readTimesheetFile, type GlobalFlags } from "./pipeline.js";

const DELIMITER_NAMES: Record<string, string> = {
  ",": "comma",
  "\t": "tab",
  ";": "semicolon",
};

export async function detect(file: string, flags: GlobalFlags = {}): Promise<void> {
  const { parser } = createPipeline(flags);

  try {
    const format = await parser.detectFormat(readTimesheetFile(file));
    console.log(`Format: ${format.name}`);
    console.log(`Delimiter: ${DELIMITER_NAMES[format.delimiter] ?? format.delimiter}`);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}
