import type {
  Measurement,
  OpenAQCountry,
  OpenAQLatest,
  OpenAQLocation,
  OpenAQSensor,
  Place,
  SensorInfo,
} from "./types.js";
import { isAirQualityParameter } from "./types.js";
import { ApiError, NotFoundError, TransportError } from "./errors.js";
import { classifyResponse, toAttemptResult, type HttpExchange } from "./http.js";
import { executeWithRetry, DEFAULT_RETRY_POLICY, type ExecuteOptions, type RetryPolicy } from "./retry.js";
import { logDebug, logInfo, logWarn } from "./logger.js";

const FETCH_TIMEOUT_MS = 30_000;
const LOCATIONS_PAGE_LIMIT = 1000;
const DEFAULT_UNIT = "µg/m³";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface AirQualityRepository {
  getMeasurementsForPlace(place: Place, locationsLimit?: number): Promise<Measurement[]>;
}

export interface OpenAQRepository extends AirQualityRepository {
  getCountries(): Promise<OpenAQCountry[]>;
  getLocations(countryIso: string): Promise<OpenAQLocation[]>;
  getLatestForLocation(locationId: number): Promise<OpenAQLatest[]>;
}

export interface OpenAQOptions {
  baseUrl: string;
  apiKey: string;
  policy?: RetryPolicy;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  /** Passed through to the retry executor (tests replace `sleep`). */
  retryOptions?: Omit<ExecuteOptions, "label">;
}

// === Payload narrowing ===

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function parseCountry(raw: unknown): OpenAQCountry | null {
  if (!isObject(raw) || typeof raw.id !== "number" || typeof raw.code !== "string") return null;
  return { id: raw.id, code: raw.code, name: optionalString(raw.name) ?? raw.code };
}

function parseSensor(raw: unknown): OpenAQSensor | null {
  if (!isObject(raw) || typeof raw.id !== "number") return null;
  const parameter: JsonObject = isObject(raw.parameter) ? raw.parameter : {};
  return {
    id: raw.id,
    parameterName: optionalString(parameter.name) ?? undefined,
    units: optionalString(parameter.units) ?? undefined,
  };
}

function parseLocation(raw: unknown): OpenAQLocation | null {
  if (!isObject(raw) || typeof raw.id !== "number") return null;
  const sensors = Array.isArray(raw.sensors) ? raw.sensors : [];
  return {
    id: raw.id,
    name: optionalString(raw.name),
    locality: optionalString(raw.locality),
    sensors: sensors.map(parseSensor).filter((s): s is OpenAQSensor => s !== null),
  };
}

function parseLatest(raw: unknown): OpenAQLatest | null {
  if (!isObject(raw) || typeof raw.sensorsId !== "number" || typeof raw.value !== "number") {
    return null;
  }
  const utc = isObject(raw.datetime) ? optionalString(raw.datetime.utc) : null;
  if (!utc) return null;
  return { sensorsId: raw.sensorsId, value: raw.value, datetimeUtc: utc };
}

// === Matching ===

export function locationMatchesPlace(location: OpenAQLocation, place: Place): boolean {
  const aliases = place.cityAliases.map((a) => a.toLowerCase());
  const locality = (location.locality ?? "").toLowerCase();
  const name = (location.name ?? "").toLowerCase();
  return aliases.includes(locality) || aliases.some((alias) => name.includes(alias));
}

export function buildSensorMap(location: OpenAQLocation): Map<number, SensorInfo> {
  const mapping = new Map<number, SensorInfo>();
  for (const sensor of location.sensors) {
    if (!sensor.parameterName || !isAirQualityParameter(sensor.parameterName)) continue;
    mapping.set(sensor.id, { parameter: sensor.parameterName, unit: sensor.units ?? DEFAULT_UNIT });
  }
  return mapping;
}

/**
 * Maps a timeout or undici's "fetch failed" to a TransportError. Anything
 * else, such as an invalid header value, is returned as-is and is not retried.
 */
function classifyFetchFailure(err: unknown, url: string): unknown {
  if (!(err instanceof Error)) return err;
  if (err.name === "TimeoutError" || err.name === "AbortError") {
    return new TransportError("timeout", `${url}: timed out: ${err.message}`, { cause: err });
  }
  if (err instanceof TypeError && err.message === "fetch failed") {
    const reason = err.cause instanceof Error ? err.cause.message : err.message;
    return new TransportError("network", `${url}: network error: ${reason}`, { cause: err });
  }
  return err;
}

export function createOpenAQRepository(options: OpenAQOptions): OpenAQRepository {
  const {
    baseUrl,
    apiKey,
    policy = DEFAULT_RETRY_POLICY,
    timeoutMs = FETCH_TIMEOUT_MS,
    fetchImpl = fetch,
    retryOptions = {},
  } = options;
  const base = baseUrl.replace(/\/+$/, "");

  async function send(url: string): Promise<HttpExchange> {
    let res: Response;
    try {
      res = await fetchImpl(url, {
        headers: { "x-api-key": apiKey, Accept: "application/json" },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw classifyFetchFailure(err, url);
    }

    let body: string;
    try {
      body = await res.text();
    } catch (err) {
      // The connection dropped or timed out mid-body.
      const failure = classifyFetchFailure(err, url);
      if (failure instanceof TransportError) throw failure;
      const msg = err instanceof Error ? err.message : String(err);
      throw new TransportError("network", `${url}: body read failed: ${msg}`, { cause: err });
    }
    return { url, status: res.status, body };
  }

  async function openaqGet(path: string, params?: Record<string, string>): Promise<unknown[]> {
    const url = new URL(`${base}${path}`);
    if (params) {
      for (const [k, v] of Object.entries(params)) {
        url.searchParams.set(k, v);
      }
    }

    const exchange = await executeWithRetry(async () => toAttemptResult(await send(url.toString())), policy, {
      ...retryOptions,
      label: `GET ${path}`,
    });
    const payload = classifyResponse(exchange);

    if (!isObject(payload) || !Array.isArray(payload.results)) {
      throw new ApiError(`OpenAQ ${path}: response has no results array`, exchange.status, exchange.body);
    }
    return payload.results;
  }

  async function getCountries(): Promise<OpenAQCountry[]> {
    logDebug("Fetching countries from OpenAQ API");
    const results = await openaqGet("/countries");
    const countries = results.map(parseCountry).filter((c): c is OpenAQCountry => c !== null);
    logInfo(`Fetched ${countries.length} countries`);
    return countries;
  }

  async function getLocations(countryIso: string): Promise<OpenAQLocation[]> {
    logDebug(`Fetching locations for country: ${countryIso}`);
    const results = await openaqGet("/locations", {
      iso: countryIso,
      limit: String(LOCATIONS_PAGE_LIMIT),
    });
    const locations = results.map(parseLocation).filter((l): l is OpenAQLocation => l !== null);
    logInfo(`Fetched ${locations.length} locations for ${countryIso}`);
    return locations;
  }

  async function getLatestForLocation(locationId: number): Promise<OpenAQLatest[]> {
    logDebug(`Fetching latest measurements for location: ${locationId}`);
    const results = await openaqGet(`/locations/${locationId}/latest`);
    const latest = results.map(parseLatest).filter((l): l is OpenAQLatest => l !== null);
    logDebug(`Fetched ${latest.length} measurements for location ${locationId}`);
    return latest;
  }

  async function latestMeasurementsForLocation(location: OpenAQLocation): Promise<Measurement[]> {
    const sensorMap = buildSensorMap(location);
    const byParameter = new Map<string, Measurement>();

    for (const item of await getLatestForLocation(location.id)) {
      const sensor = sensorMap.get(item.sensorsId);
      if (!sensor) continue;

      const measurement: Measurement = {
        city: location.locality ?? "",
        location: location.name ?? "",
        parameter: sensor.parameter,
        value: item.value,
        unit: sensor.unit,
        timestamp: new Date(item.datetimeUtc),
      };
      const current = byParameter.get(sensor.parameter);
      if (!current || measurement.timestamp >= current.timestamp) {
        byParameter.set(sensor.parameter, measurement);
      }
    }

    return [...byParameter.values()];
  }

  async function getMeasurementsForPlace(place: Place, locationsLimit = 3): Promise<Measurement[]> {
    const locations = await getLocations(place.countryIso);
    const matched = locations.filter((loc) => locationMatchesPlace(loc, place));
    logInfo(
      `${matched.length} stations match ${place.cityAliases[0] ?? place.countryIso}, using up to ${locationsLimit}`
    );

    const measurements: Measurement[] = [];
    for (const location of matched.slice(0, locationsLimit)) {
      try {
        measurements.push(...(await latestMeasurementsForLocation(location)));
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        logWarn(`No latest readings for station ${location.id} (${location.name ?? "unnamed"}), skipping`);
      }
    }
    return measurements;
  }

  return { getCountries, getLocations, getLatestForLocation, getMeasurementsForPlace };
}
