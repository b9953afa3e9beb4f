import type { JsonObject } from "./json.js";
import { errorMessage } from "./json.js";

export type FatalErrorCode =
  | "retries_exhausted"
  | "no_recognized_link"
  | "annotation_format_unrecognized"
  | "archive_versions_exhausted"
  | "download_stream_failed"
  | "extraction_failed"
  | "invalid_config"
  | "output_directory_conflict"
  | "missing_precondition";

/**
 * Terminates the whole run. Components never catch these; the entry point maps
 * them to a failed run and a non-zero exit code.
 */
export class FatalRunError extends Error {
  constructor(
    readonly code: FatalErrorCode,
    message: string,
    readonly context: JsonObject = {}
  ) {
    super(message);
    this.name = "FatalRunError";
  }
}

export class RetriesExhaustedError extends FatalRunError {
  constructor(operation: string, attempts: number, lastError: unknown) {
    super("retries_exhausted", `too many failures for ${operation} (${attempts} attempts)`, {
      operation,
      attempts,
      last_error: lastError === null ? null : errorMessage(lastError)
    });
    this.name = "RetriesExhaustedError";
  }
}

export class NoRecognizedLinkError extends FatalRunError {
  constructor(assemblyUid: string, available: string[], reason: string) {
    super("no_recognized_link", `no usable contig link for assembly ${assemblyUid}: ${reason}`, {
      assembly_uid: assemblyUid,
      available_links: available
    });
    this.name = "NoRecognizedLinkError";
  }
}

export class AnnotationFormatError extends FatalRunError {
  constructor(annotation: string, reason: string) {
    super("annotation_format_unrecognized", `archive annotation format unrecognized (${reason}): ${annotation}`, {
      annotation
    });
    this.name = "AnnotationFormatError";
  }
}

export class ArchiveVersionExhaustedError extends FatalRunError {
  constructor(downloadStem: string, attemptedVersions: number[]) {
    super(
      "archive_versions_exhausted",
      `no downloadable archive version for ${downloadStem} (tried ${attemptedVersions.join(", ") || "none"})`,
      { download_stem: downloadStem, attempted_versions: attemptedVersions }
    );
    this.name = "ArchiveVersionExhaustedError";
  }
}

export class DownloadStreamError extends FatalRunError {
  constructor(url: string, destPath: string, reason: string) {
    super("download_stream_failed", `download failed for ${url}: ${reason}`, { url, dest_path: destPath });
    this.name = "DownloadStreamError";
  }
}

export class ExtractionError extends FatalRunError {
  constructor(archivePath: string, destPath: string, reason: string) {
    super("extraction_failed", `extracting ${archivePath} to ${destPath} failed: ${reason}`, {
      archive_path: archivePath,
      dest_path: destPath
    });
    this.name = "ExtractionError";
  }
}

export class ConfigError extends FatalRunError {
  constructor(source: string, reason: string) {
    super("invalid_config", `invalid config at ${source}: ${reason}`, { source });
    this.name = "ConfigError";
  }
}

export class OutputDirectoryError extends FatalRunError {
  constructor(dir: string, reason: string) {
    super("output_directory_conflict", `output directory ${dir}: ${reason}`, { dir });
    this.name = "OutputDirectoryError";
  }
}

/** A single remote call failed; retryable. */
export class EntrezResponseError extends Error {
  constructor(
    readonly endpoint: string,
    message: string,
    readonly status: number | null = null
  ) {
    super(`${endpoint}: ${message}`);
    this.name = "EntrezResponseError";
  }
}
