import { CancelledError, TimesheetError, errorMessage } from "../core/errors.js";
import { throwIfCancelled } from "../core/cancel.js";
import type { TimesheetSource } from "./types.js";

const BOM = "\uFEFF";

/** Decode UTF-8, replacing invalid sequences rather than failing */
function decode(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("utf-8");
}

function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(1) : text;
}

/** Buffer the whole source into a string. */
export async function readSource(source: TimesheetSource, signal?: AbortSignal): Promise<string> {
  throwIfCancelled(signal);

  if (typeof source === "string") return stripBom(source);
  if (source instanceof Uint8Array) return stripBom(decode(source));

  const chunks: Uint8Array[] = [];
  try {
    for await (const chunk of source) {
      throwIfCancelled(signal);
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
    }
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    throw new TimesheetError("read_failed", `failed to read input: ${errorMessage(err)}`, { cause: err });
  }

  return stripBom(decode(Buffer.concat(chunks)));
}
