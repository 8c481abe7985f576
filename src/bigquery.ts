import { BigQuery, type TableField } from "@google-cloud/bigquery";
import type { Config } from "./types.js";
import { ConfigurationError } from "./errors.js";
import { CSV_DELIMITER } from "./csv.js";
import { logInfo } from "./logger.js";

export interface DataWarehouseLoader {
  /** Load a CSV object from GCS; resolves to the number of rows loaded. */
  loadFromGcs(gcsUri: string): Promise<number>;
}

export const MEASUREMENTS_SCHEMA: TableField[] = [
  { name: "city", type: "STRING", mode: "REQUIRED" },
  { name: "location", type: "STRING", mode: "REQUIRED" },
  { name: "parameter", type: "STRING", mode: "REQUIRED" },
  { name: "value", type: "FLOAT64", mode: "REQUIRED" },
  { name: "unit", type: "STRING", mode: "REQUIRED" },
  { name: "timestamp", type: "TIMESTAMP", mode: "REQUIRED" },
];

const DATASET_LOCATION = "EU";

export function isGcsUri(uri: string): boolean {
  return /^gs:\/\/[^/]+\/.+$/.test(uri);
}

export interface BigQueryLoaderOptions {
  projectId: string;
  datasetId: string;
  tableId: string;
  credentialsPath?: string;
}

export function createBigQueryLoader(options: BigQueryLoaderOptions): DataWarehouseLoader {
  const { projectId, datasetId, tableId, credentialsPath } = options;
  const fullTableId = `${projectId}.${datasetId}.${tableId}`;

  if (credentialsPath) {
    logInfo(`Using service account file for BQ: ${credentialsPath}`);
  } else {
    logInfo("Using Application Default Credentials (ADC) for BQ");
  }
  const bigquery = new BigQuery(credentialsPath ? { projectId, keyFilename: credentialsPath } : { projectId });
  const dataset = bigquery.dataset(datasetId);
  const table = dataset.table(tableId);

  async function ensureDatasetExists(): Promise<void> {
    const [exists] = await dataset.exists();
    if (exists) {
      logInfo(`Dataset ${projectId}.${datasetId} already exists`);
      return;
    }
    await bigquery.createDataset(datasetId, { location: DATASET_LOCATION });
    logInfo(`Created dataset ${projectId}.${datasetId}`);
  }

  async function ensureTableExists(): Promise<void> {
    await ensureDatasetExists();
    const [exists] = await table.exists();
    if (exists) {
      logInfo(`Table ${fullTableId} already exists`);
      return;
    }
    await dataset.createTable(tableId, { schema: { fields: MEASUREMENTS_SCHEMA } });
    logInfo(`Created table ${fullTableId}`);
  }

  return {
    async loadFromGcs(gcsUri) {
      logInfo(`Loading ${gcsUri} into ${fullTableId}`);
      if (!isGcsUri(gcsUri)) throw new ConfigurationError(`Not a GCS URI: ${gcsUri}`);
      await ensureTableExists();

      const [job] = await bigquery.createJob({
        configuration: {
          load: {
            sourceUris: [gcsUri],
            destinationTable: { projectId, datasetId, tableId },
            sourceFormat: "CSV",
            skipLeadingRows: 1,
            fieldDelimiter: CSV_DELIMITER,
            schema: { fields: MEASUREMENTS_SCHEMA },
            writeDisposition: "WRITE_APPEND",
          },
        },
      });
      await job.promise();
      const [jobMetadata] = await job.getMetadata();
      const rowsLoaded = Number(jobMetadata.statistics?.load?.outputRows ?? 0);

      const [metadata] = await table.getMetadata();
      logInfo(`Loaded ${rowsLoaded} rows into ${fullTableId}. Table now has ${metadata.numRows ?? "?"} total rows.`);
      return rowsLoaded;
    },
  };
}

export function createWarehouseLoader(config: Config): DataWarehouseLoader | undefined {
  if (!config.bigqueryEnabled || !config.bigqueryProjectId) return undefined;
  return createBigQueryLoader({
    projectId: config.bigqueryProjectId,
    datasetId: config.bigqueryDatasetId,
    tableId: config.bigqueryTableId,
    credentialsPath: config.gcsCredentialsPath,
  });
}
