import type { OutputFormat } from "../core/config.js";
import { createAnsiFormatter } from "../core/error-format.js";

import { ConsoleReporter } from "./console.js";
import { JsonReporter } from "./json.js";
import type { Reporter, TextSink } from "./reporter.js";

export type { PlanSummary, Reporter, TextSink } from "./reporter.js";
export { ConsoleReporter } from "./console.js";
export { JsonReporter } from "./json.js";
export { renderHumanReport, summarize, toStructuredReport } from "./summary.js";

export function createReporter(options: {
  output: OutputFormat;
  sink: TextSink;
  verbose: boolean;
  useColor: boolean;
}): Reporter {
  if (options.output === "json") {
    return new JsonReporter(options.sink);
  }
  return new ConsoleReporter(options.sink, {
    verbose: options.verbose,
    format: createAnsiFormatter(options.useColor),
  });
}
