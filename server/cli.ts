import { loadConfig } from "./config";
import { createRuntime, type Runtime } from "./runtime";
import { EXIT_CODES, failedRunReport, runIndexer, type IndexRunReport } from "./lib/sync";
import { log } from "./lib/log";
import { errorMessage } from "./lib/errors";
import { randomUUID } from "crypto";

function printReport(report: IndexRunReport) {
  for (const p of report.providers) {
    const line =
      `${p.providerType}/${p.providerName}: listed ${p.listed}, indexed ${p.indexed}, unchanged ${p.unchanged}, ` +
      `removed ${p.removed}, not found ${p.notFound}, failed ${p.failed}, chunks ${p.chunks}`;
    log(p.error ? `${line} (error: ${p.error})` : line, "cli");
  }
  for (const f of report.failures) {
    log(`  ${f.providerType}/${f.providerName} ${f.filename} [${f.stage}/${f.kind}] ${f.message}`, "cli", "warn");
  }
  log(`Run ${report.runId} ${report.status} (exit ${report.exitCode}) in ${report.durationMs}ms`, "cli");
}

/** One indexing pass, then exit with the run's exit code. */
async function main(): Promise<number> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    log(`${signal} received, cancelling run`, "cli", "warn");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const startedAt = new Date();
  let runtime: Runtime;
  try {
    runtime = await createRuntime(loadConfig());
  } catch (error) {
    log(`Startup failed: ${errorMessage(error)}`, "cli", "error");
    return EXIT_CODES.failed;
  }

  try {
    let report: IndexRunReport;
    try {
      const snapshot = await runtime.configuration.getSnapshot();
      report = await runIndexer(snapshot, runtime.deps, runtime.indexerOptions, controller.signal);
    } catch (error) {
      log(`Failed to load provider configuration: ${errorMessage(error)}`, "cli", "error");
      report = failedRunReport(randomUUID(), startedAt, error);
    }
    printReport(report);
    return report.exitCode;
  } finally {
    await runtime.db.pool.end();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    log(`Fatal: ${errorMessage(error)}`, "cli", "error");
    process.exit(EXIT_CODES.failed);
  });
