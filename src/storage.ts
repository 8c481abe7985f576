import { existsSync, mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { Storage } from "@google-cloud/storage";
import type { Config, Measurement } from "./types.js";
import { generateCsv } from "./csv.js";
import { logInfo, logWarn } from "./logger.js";

export interface MeasurementStorage {
  /** Persist the measurements as CSV; resolves to the path or URI written, or "" when empty. */
  save(measurements: Measurement[]): Promise<string>;
}

export function createLocalStorage(outputDir: string, clock: () => Date = () => new Date()): MeasurementStorage {
  return {
    async save(measurements) {
      if (measurements.length === 0) {
        logWarn("No measurements to save");
        return "";
      }

      const { content, filename } = generateCsv(measurements, clock());
      mkdirSync(outputDir, { recursive: true });
      const filePath = join(outputDir, filename);
      writeFileSync(filePath, content);

      logInfo(`Saved locally to: ${filePath}`);
      return filePath;
    },
  };
}

export interface GcsStorageOptions {
  bucketName: string;
  /** Service account key file; Application Default Credentials when absent. */
  credentialsPath?: string;
}

export function createGcsStorage(options: GcsStorageOptions): MeasurementStorage {
  const { bucketName, credentialsPath } = options;
  const client = credentialsPath ? new Storage({ keyFilename: credentialsPath }) : new Storage();
  const bucket = client.bucket(bucketName);

  return {
    async save(measurements) {
      if (measurements.length === 0) {
        logWarn("No measurements to save");
        return "";
      }

      const { content, filename } = generateCsv(measurements);
      await bucket.file(filename).save(content, {
        contentType: "text/csv; charset=utf-8",
        resumable: false,
      });

      const uri = `gs://${bucketName}/${filename}`;
      logInfo(`Uploaded to GCS: ${uri}`);
      return uri;
    },
  };
}

export function createStorage(config: Config): MeasurementStorage {
  const { gcsBucketName, gcsCredentialsPath, dataOutputDir } = config;

  if (gcsBucketName) {
    if (!gcsCredentialsPath) {
      logInfo(`Using GCS storage (bucket: ${gcsBucketName}) with ADC`);
      return createGcsStorage({ bucketName: gcsBucketName });
    }
    if (existsSync(gcsCredentialsPath)) {
      logInfo(`Using GCS storage (bucket: ${gcsBucketName}) with credentials file`);
      return createGcsStorage({ bucketName: gcsBucketName, credentialsPath: gcsCredentialsPath });
    }
    logWarn(
      `GCS credentials configured but not found at: ${gcsCredentialsPath}. Falling back to local storage.`
    );
  }

  logInfo(`Using local storage only (output: ${dataOutputDir})`);
  return createLocalStorage(dataOutputDir);
}
