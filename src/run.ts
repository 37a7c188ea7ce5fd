import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger, pruneOldLogs } from "./logging.js";
import { QuoteMonitor, type QuoteMonitorParams } from "./monitor.js";
import { createConsoleRenderer } from "./render/quote-table.js";
import type { SessionSummary } from "./aggregator/session-summary.js";

export interface RunQuoteMonitorParams extends Omit<QuoteMonitorParams, "renderer"> {
  symbols: string[];
  renderer?: QuoteMonitorParams["renderer"];
  /** Stop on SIGINT/SIGTERM and log the session summary (default true) */
  handleSignals?: boolean;
  onStopped?: (summary: SessionSummary) => void;
}

/**
 * Validates the process config, prunes old logs and starts a monitor that
 * draws the quote table on stdout.
 */
export async function runQuoteMonitor(params: RunQuoteMonitorParams): Promise<QuoteMonitor> {
  // Validate configuration early
  const validation = validateConfig({ ...config, aggregator: { ...config.aggregator, ...params.options } });
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  pruneOldLogs(config.logging.keepDays);

  const monitor = new QuoteMonitor({
    ...params,
    renderer: params.renderer ?? createConsoleRenderer(),
  });

  const subscribed = await monitor.start(params.symbols);
  if (subscribed.length === 0) {
    logger.warn({ requested: params.symbols.length }, "No symbols subscribed");
  }

  if (params.handleSignals ?? true) {
    const shutdown = (signal: NodeJS.Signals) => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      logger.info({ signal }, "Shutting down quote monitor");
      monitor
        .stop()
        .then((summary) => params.onStopped?.(summary))
        .catch((err: unknown) => logger.error({ err }, "Shutdown failed"));
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  }

  return monitor;
}
