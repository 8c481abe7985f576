import { apiRetryPolicy, loadConfig, loadPlaces } from "./config.js";
import { createOpenAQRepository } from "./openaq.js";
import { createStorage } from "./storage.js";
import { createWarehouseLoader } from "./bigquery.js";
import { describePlace, recordRun, runPipeline } from "./pipeline.js";
import { ConfigurationError, describeError } from "./errors.js";
import { readJsonl, RUNS_FILE } from "./data.js";
import { logError, logInfo } from "./logger.js";
import type { Config, RunRecord } from "./types.js";

function createRepository(config: Config) {
  return createOpenAQRepository({
    baseUrl: config.openaqBaseUrl,
    apiKey: config.openaqApiKey,
    policy: apiRetryPolicy(config),
    timeoutMs: config.apiTimeoutMs,
  });
}

async function runEtl() {
  await recordRun(async (run) => {
    const config = loadConfig();
    run.places = loadPlaces(config.placesFile);
    logInfo(`Starting air quality ETL pipeline (run ${run.runId.slice(0, 8)})`);
    logInfo(
      `Places: ${run.places.map(describePlace).join(", ")} | stations per place: ${config.localitiesPerPlace}`
    );

    const deps = {
      repository: createRepository(config),
      storage: createStorage(config),
      warehouse: createWarehouseLoader(config),
    };
    return runPipeline(deps, run.places, config.localitiesPerPlace);
  });
}

async function runCountries() {
  const config = loadConfig();
  const countries = await createRepository(config).getCountries();

  console.log(`\n=== OpenAQ countries (${countries.length}) ===\n`);
  for (const c of [...countries].sort((a, b) => a.code.localeCompare(b.code))) {
    console.log(`  ${c.code.padEnd(4)} ${c.name}`);
  }
  console.log("");
}

async function runLocations(countryIso: string | undefined) {
  if (!countryIso) throw new ConfigurationError("Usage: locations <ISO country code>");
  const config = loadConfig();
  const locations = await createRepository(config).getLocations(countryIso.toUpperCase());

  console.log(`\n=== Stations in ${countryIso.toUpperCase()} (${locations.length}) ===\n`);
  for (const loc of locations) {
    const params = loc.sensors.map((s) => s.parameterName ?? "?").join(",");
    console.log(
      `  ${String(loc.id).padEnd(8)} ${(loc.locality ?? "-").padEnd(20)} ${(loc.name ?? "-").slice(0, 40).padEnd(40)} ${params}`
    );
  }
  console.log("");
}

function runHistory() {
  const runs = readJsonl<RunRecord>(RUNS_FILE);

  if (runs.length === 0) {
    logInfo("No pipeline runs recorded yet.");
    return;
  }

  const recent = runs.slice(-20);
  const failed = runs.filter((r) => r.status === "failed").length;
  console.log(`\n=== Pipeline runs (${runs.length} total, ${failed} failed) ===\n`);
  for (const r of recent) {
    const loaded = r.rowsLoaded !== undefined ? ` bq=${r.rowsLoaded}` : "";
    const tail = r.status === "failed" ? ` ${r.error ?? ""}` : ` ${r.outputPath || "(nothing saved)"}`;
    console.log(
      `  ${r.startedAt.slice(0, 19)} ${r.status.padEnd(7)} n=${String(r.measurements).padEnd(4)}${loaded}${tail}`
    );
  }
  console.log("");
}

function fail(err: unknown): never {
  logError(describeError(err));
  process.exit(1);
}

const command = process.argv[2] || "run";

switch (command) {
  case "run":
    runEtl().catch(fail);
    break;
  case "countries":
    runCountries().catch(fail);
    break;
  case "locations":
    runLocations(process.argv[3]).catch(fail);
    break;
  case "history":
    runHistory();
    break;
  default:
    logError(`Unknown command: ${command}. Use: run, countries, locations <ISO>, history`);
    process.exit(1);
}
