import { intro, log, outro } from "@clack/prompts";
import { resolveConfig } from "../config/load.js";
import { createGateway } from "../gateway.js";
import { silentLogger } from "../log.js";
import { summarizeOutcomes } from "../registry/registry.js";

/**
 * Register every route group against a throwaway router and print one
 * line per outcome. Sets exit code 1 if any group failed. Nothing listens.
 */
export async function runDiagnose(): Promise<void> {
  intro("introspect-gateway diagnose");

  const config = resolveConfig();
  const { app, outcomes } = await createGateway(config, { log: silentLogger });

  for (const outcome of outcomes) {
    if (outcome.status === "mounted") {
      const note = outcome.replaced ? " (replaced an earlier group)" : "";
      log.success(`${outcome.name} → ${outcome.urlPrefix}${note}`);
    } else {
      log.error(`${outcome.name} → ${outcome.urlPrefix}\n${outcome.reason}`);
    }
  }

  log.info(`Reachable routes:\n${app.describe().join("\n")}`);

  const { mounted, failed, total } = summarizeOutcomes(outcomes);
  outro(`Mounted: ${mounted}  Failed: ${failed}  Checked: ${total}`);
  process.exitCode = failed > 0 ? 1 : 0;
}
