// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/main`
 * Purpose: Service entry point. Replays the scenario named by SCENARIO_PATH and reports the outcome.
 * Scope: Calls env(), wires logger, loader and runner. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Exit code 0 only when every step behaved as the scenario expects
 * Side-effects: IO (file read, stdout, process exit code)
 * @public
 */

import { env } from "./bootstrap/env";
import { makeLogger } from "./observability/logger";
import { runScenario } from "./runner";
import { loadScenario } from "./scenario/load";

async function main(): Promise<void> {
  const config = env();

  // Composition root owns logger creation
  const logger = makeLogger({
    level: config.LOG_LEVEL,
    serviceName: config.SERVICE_NAME,
  });

  logger.info({ scenarioPath: config.SCENARIO_PATH }, "Loading scenario");
  const scenario = await loadScenario(config.SCENARIO_PATH);

  const summary = runScenario(scenario, logger);
  logger.info(
    {
      scenario: summary.name,
      applied: summary.applied,
      rejected: summary.rejected,
      failures: summary.failures,
      balances: summary.balances,
      holderCount: summary.snapshot.holderCount,
      burnerCount: summary.snapshot.burnerCount,
      burnTotal: summary.snapshot.burnTotal.toString(),
    },
    "Scenario replayed"
  );

  if (summary.failures.length > 0) {
    logger.error(
      { failures: summary.failures.length },
      "Scenario did not behave as expected"
    );
    process.exitCode = 1;
  }
  logger.flush();
}

const bootLogger = makeLogger({ bindings: { phase: "boot" } });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during replay");
  bootLogger.flush();
  process.exit(1);
});
