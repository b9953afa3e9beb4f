import type { ColumnType, Generated, JSONColumnType } from "kysely";
import type { JsonObject, JsonValue } from "../core/json.js";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
// pg returns timestamptz as Date; inserts take ISO strings.
type Timestamp = ColumnType<Date | string, string | undefined, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;

export interface DownloadRunsTable {
  run_id: string;
  taxa: JSONColumnType<JsonValue[], string, string>;
  source: string;
  out_dir: string;
  config_hash: string;
  status: string;
  started_at: Timestamp;
  finished_at: TimestampNullable;
  error_code: OptionalNullable<string>;
  error_message: OptionalNullable<string>;
  summary: JSONColumnType<JsonObject | null, string | null | undefined, string | null>;
}

export interface RunEventsTable {
  event_id: Generated<string>;
  run_id: string;
  ts: Timestamp;
  level: string;
  kind: string;
  message: string;
  data: JSONColumnType<JsonObject | null, string | null | undefined, string | null>;
}

export interface AssemblyOutcomesTable {
  outcome_id: Generated<string>;
  run_id: string;
  taxon_id: string;
  assembly_uid: string;
  accession: string;
  organism: string;
  strain: string;
  strategy: string;
  state: string;
  output_path: OptionalNullable<string>;
  source_url: OptionalNullable<string>;
  expected_records: OptionalNullable<number>;
  returned_records: OptionalNullable<number>;
  hash_passed: OptionalNullable<boolean>;
  local_hash: OptionalNullable<string>;
  remote_hash: OptionalNullable<string>;
}

export interface DB {
  download_runs: DownloadRunsTable;
  run_events: RunEventsTable;
  assembly_outcomes: AssemblyOutcomesTable;
}
