/**
 * annotate command - check, then print the analysis annotations
 */

import { printAnnotations } from "@lifthook/frontend";
import type { ResolvedConfig } from "../types.js";
import { runAnalysis } from "./check.js";

export const annotateCommand = (config: ResolvedConfig): number => {
  const { exitCode, result } = runAnalysis(config);
  if (!result || config.quiet) return exitCode;

  for (const unit of result.units) {
    console.log(`# ${unit.unit.filePath}`);
    const text = printAnnotations(unit);
    if (text.length > 0) console.log(text);
  }
  return exitCode;
};
