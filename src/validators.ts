import type { Measurement } from "./types.js";
import { isAirQualityParameter } from "./types.js";
import { ValidationError } from "./errors.js";

export function validateMeasurement(measurement: Measurement, now: Date = new Date()): void {
  if (!measurement.city) throw new ValidationError("City is required");
  if (!measurement.location) throw new ValidationError("Location is required");

  if (!measurement.parameter || !isAirQualityParameter(measurement.parameter)) {
    throw new ValidationError("Parameter is required");
  }

  if (!Number.isFinite(measurement.value)) {
    throw new ValidationError("Measurement value is required");
  }
  if (measurement.value < 0) {
    throw new ValidationError("Measurement value cannot be negative");
  }

  if (!measurement.unit) throw new ValidationError("Unit is required");

  if (!(measurement.timestamp instanceof Date) || isNaN(measurement.timestamp.getTime())) {
    throw new ValidationError("Timestamp must be a valid date");
  }
  if (measurement.timestamp > now) {
    throw new ValidationError("Timestamp cannot be in the future");
  }
}
