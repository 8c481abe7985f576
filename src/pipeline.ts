import { randomUUID } from "crypto";
import type { Measurement, Place, RunRecord } from "./types.js";
import type { AirQualityRepository } from "./openaq.js";
import type { MeasurementStorage } from "./storage.js";
import { isGcsUri, type DataWarehouseLoader } from "./bigquery.js";
import { describeError, ValidationError } from "./errors.js";
import { validateMeasurement } from "./validators.js";
import { logError, logInfo, logRun } from "./logger.js";

export interface PipelineDeps {
  repository: AirQualityRepository;
  storage: MeasurementStorage;
  warehouse?: DataWarehouseLoader;
  clock?: () => Date;
}

export interface PipelineResult {
  outputPath: string;
  measurements: number;
  rowsLoaded?: number;
  cities: string[];
}

export function describePlace(place: Place): string {
  return place.cityAliases[0] ?? place.countryIso;
}

export async function fetchMeasurements(
  repository: AirQualityRepository,
  places: Place[],
  locationsLimit: number,
  now: Date = new Date(),
): Promise<Measurement[]> {
  const all: Measurement[] = [];

  for (const place of places) {
    const measurements = await repository.getMeasurementsForPlace(place, locationsLimit);
    let dropped = 0;
    for (const measurement of measurements) {
      try {
        validateMeasurement(measurement, now);
        all.push(measurement);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        dropped++;
        logError(
          `Validation error for ${measurement.parameter} at ${measurement.location || "(no location)"}: ${err.message}`
        );
      }
    }
    logInfo(`${describePlace(place)}: ${measurements.length - dropped}/${measurements.length} measurements valid`);
  }

  return all;
}

/** Fetch, validate and store one batch; load it into the warehouse when it landed in GCS. */
export async function runPipeline(
  deps: PipelineDeps,
  places: Place[],
  locationsLimit = 3,
): Promise<PipelineResult> {
  const now = deps.clock?.() ?? new Date();
  logInfo(`Fetching measurements for ${places.length} places`);

  const measurements = await fetchMeasurements(deps.repository, places, locationsLimit, now);
  logInfo(`Fetched ${measurements.length} valid measurements`);

  const outputPath = await deps.storage.save(measurements);
  if (outputPath) logInfo(`Saved measurements to: ${outputPath}`);

  let rowsLoaded: number | undefined;
  if (deps.warehouse && isGcsUri(outputPath)) {
    rowsLoaded = await deps.warehouse.loadFromGcs(outputPath);
    logInfo(`Loaded ${rowsLoaded} rows to data warehouse`);
  }

  return {
    outputPath,
    measurements: measurements.length,
    rowsLoaded,
    cities: places.map(describePlace),
  };
}

export interface RunContext {
  runId: string;
  /** Set by the job once known; recorded as the run's cities. */
  places: Place[];
}

/**
 * Run `job` and append a run record whether it succeeds or throws. Setup
 * failures (config, places file) happen inside the job so they are recorded too.
 */
export async function recordRun(
  job: (context: RunContext) => Promise<PipelineResult>,
  record: (run: RunRecord) => void = logRun,
): Promise<PipelineResult> {
  const startedAt = new Date().toISOString();
  const context: RunContext = { runId: randomUUID(), places: [] };

  try {
    const result = await job(context);
    record({
      runId: context.runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      status: "success",
      ...result,
    });
    return result;
  } catch (err) {
    record({
      runId: context.runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      status: "failed",
      outputPath: "",
      measurements: 0,
      cities: context.places.map(describePlace),
      error: describeError(err),
    });
    throw err;
  }
}
