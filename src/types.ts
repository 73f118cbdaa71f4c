/**
 * Domain model shared by the parser, orchestrator, interpreter and store.
 */

export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFORMATIONAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type SeverityCounts = Record<Severity, number>;

export type AlertThreshold = 'CRITICAL' | 'HIGH';

/**
 * A container image reference split into its coordinates.
 * `fullName` uses the `@digest` form whenever a digest is present.
 */
export interface ImageReference {
  readonly registry: string;
  readonly repository: string;
  readonly tag: string;
  readonly digest?: string;
  readonly fullName: string;
  /** Raw string the reference was parsed from */
  readonly original: string;
}

export type ScanTags = Record<string, string>;

/**
 * One scan attempt. Discarded once the job has been torn down.
 */
export interface ScanJobSpec {
  jobName: string;
  projectId: string;
  image: ImageReference;
  tags: ScanTags;
  timeoutSeconds: number;
}

export interface VulnerabilityDetail {
  id?: string;
  cve?: string;
  severity: Severity;
  title?: string;
  package?: string;
  version?: string;
  fixedVersion?: string;
}

export interface VulnerabilitySummary {
  counts: SeverityCounts;
  total: number;
  details: VulnerabilityDetail[];
}

export interface ComplianceCheck {
  id?: string;
  title?: string;
  status: string;
  description?: string;
}

export interface ComplianceSummary {
  passed: number;
  failed: number;
  total: number;
  checks: ComplianceCheck[];
}

export type ScanStatus = 'COMPLETED' | 'PARSE_ERROR';

export interface ScanMetadata {
  registry: string;
  repository: string;
  tag: string;
  digest?: string;
  scanTimestamp: string;
  scanner: string;
  jobName: string;
  executionName?: string;
}

export interface ScanResult {
  scanId: string;
  status: ScanStatus;
  image: string;
  vulnerabilities: VulnerabilitySummary;
  compliance: ComplianceSummary;
  metadata: ScanMetadata;
  /** Decode error message, set when status is PARSE_ERROR */
  error?: string;
  /** Undecodable scanner output, set when status is PARSE_ERROR */
  rawOutput?: string;
}

/**
 * Full result payload written to the blob store.
 */
export interface ScanResultRecord extends ScanResult {
  timestamp: string;
  containerType: string;
  originalImage: string;
  projectId?: string;
  serviceName?: string;
  location?: string;
  eventId?: string;
}

/**
 * Compact, queryable projection written to the metadata store.
 * Field names are the stored document's field names.
 */
export interface ScanRecord {
  image: string;
  scan_id: string;
  timestamp_str: string;
  status: ScanStatus;
  container_type: string;
  project_id?: string;
  service_name?: string;
  location?: string;
  vuln_critical: number;
  vuln_high: number;
  vuln_medium: number;
  vuln_low: number;
  vuln_informational: number;
  vuln_total: number;
  compliance_passed: number;
  compliance_failed: number;
  blob_path: string;
  sanitized_image_name: string;
}

export interface ErrorRecord {
  timestamp: string;
  image: string;
  error: string;
  projectId?: string;
  serviceName?: string;
  location?: string;
  eventId?: string;
}

export interface ImageFailure {
  image: string;
  error: string;
}

/**
 * Outcome of handling one deployment event.
 */
export interface BatchReport {
  eventId: string;
  serviceName?: string;
  results: ScanResultRecord[];
  skipped: string[];
  failures: ImageFailure[];
}

export function emptySeverityCounts(): SeverityCounts {
  return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFORMATIONAL: 0 };
}

/**
 * JSON output schema for the CLI
 */
export interface BatchReportJson {
  summary: {
    eventId: string;
    serviceName?: string;
    scanned: number;
    skipped: number;
    failed: number;
    totalVulnerabilities: number;
    scanDuration: string;
    timestamp: string;
  };
  images: {
    image: string;
    originalImage: string;
    scanId: string;
    status: ScanStatus;
    counts: SeverityCounts;
    total: number;
    compliance: { passed: number; failed: number; total: number };
    vulnerabilities: VulnerabilityDetail[];
  }[];
  skipped: string[];
  failures: ImageFailure[];
}
