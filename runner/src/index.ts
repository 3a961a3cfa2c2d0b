#!/usr/bin/env node
import { config } from "dotenv";
import { loadRunnerConfig } from "./config.js";
import { HeadlessHost, type RunSummary } from "./HeadlessHost.js";

// Load environment variables
config();

async function main(): Promise<void> {
  const runnerConfig = loadRunnerConfig();
  console.log(
    "[Runner] Starting headless run:",
    runnerConfig.runSeconds + "s at " + runnerConfig.simTickHz + "Hz",
    runnerConfig.realtime ? "(realtime)" : "(fast)",
  );

  const host = new HeadlessHost(runnerConfig);
  const summary: RunSummary = runnerConfig.realtime
    ? await host.runRealtime()
    : host.runFast();

  console.log("[Runner] Finished after", summary.simulatedSeconds.toFixed(1) + "s simulated");
  console.log("[Runner] Games finished:", summary.gamesFinished);
  console.log("[Runner] Best score:", summary.bestScore);
  console.log("[Runner] Highest wave:", summary.highestWave);
}

main().catch((error: unknown) => {
  console.error("[Runner] Run failed", error);
  process.exitCode = 1;
});
