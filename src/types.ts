export interface Config {
  openaqApiKey: string;
  openaqBaseUrl: string;
  localitiesPerPlace: number;
  placesFile: string;
  dataOutputDir: string;
  // Google Cloud
  gcsBucketName?: string;
  gcsCredentialsPath?: string;
  bigqueryEnabled: boolean;
  bigqueryProjectId?: string;
  bigqueryDatasetId: string;
  bigqueryTableId: string;
  // OpenAQ request behaviour
  apiMaxRetries: number;
  apiBaseDelayMs: number;
  apiMaxDelayMs: number;
  apiTimeoutMs: number;
}

export const AIR_QUALITY_PARAMETERS = ["pm25", "pm10", "o3", "no2"] as const;

export type AirQualityParameter = (typeof AIR_QUALITY_PARAMETERS)[number];

export function isAirQualityParameter(value: string): value is AirQualityParameter {
  return AIR_QUALITY_PARAMETERS.some((p) => p === value);
}

export interface Place {
  countryIso: string;
  cityAliases: string[];
}

export interface Measurement {
  city: string;
  location: string;
  parameter: AirQualityParameter;
  value: number;
  unit: string;
  timestamp: Date;
}

export interface SensorInfo {
  parameter: AirQualityParameter;
  unit: string;
}

// === OpenAQ v3 payloads (only the fields we read) ===

export interface OpenAQCountry {
  id: number;
  code: string;
  name: string;
}

export interface OpenAQSensor {
  id: number;
  parameterName?: string;
  units?: string;
}

export interface OpenAQLocation {
  id: number;
  name: string | null;
  locality: string | null;
  sensors: OpenAQSensor[];
}

export interface OpenAQLatest {
  sensorsId: number;
  value: number;
  datetimeUtc: string;
}

export interface RunRecord {
  runId: string;
  startedAt: string;
  finishedAt: string;
  status: "success" | "failed";
  outputPath: string;
  measurements: number;
  rowsLoaded?: number;
  cities: string[];
  error?: string;
}
