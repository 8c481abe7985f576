import type { Measurement } from "../src/types.js";

export const TIMESTAMP = new Date("2025-12-14T12:00:00Z");

export function measurement(overrides: Partial<Measurement> = {}): Measurement {
  return {
    city: "Warsaw",
    location: "Warszawa, ul. Marszałkowska",
    parameter: "pm25",
    value: 15.5,
    unit: "µg/m³",
    timestamp: TIMESTAMP,
    ...overrides,
  };
}

export function sampleMeasurements(): Measurement[] {
  return [
    measurement({ location: "Station A" }),
    measurement({ location: "Station B", parameter: "pm10", value: 25 }),
    measurement({ city: "London", location: "Station C", parameter: "no2", value: 34 }),
  ];
}
