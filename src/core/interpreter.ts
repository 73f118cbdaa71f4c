import {
  emptySeverityCounts,
  type ComplianceCheck,
  type ComplianceSummary,
  type ImageReference,
  type ScanResult,
  type Severity,
  type VulnerabilityDetail,
  type VulnerabilitySummary,
} from '../types.js';
import { errorMessage } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export const SCANNER_NAME = 'qscanner-cloudrun';

type JsonObject = Record<string, unknown>;

export interface InterpretContext {
  reference: ImageReference;
  jobName: string;
  executionName?: string;
  now: Date;
}

const NUMERIC_SEVERITY: Record<string, Severity> = {
  '5': 'CRITICAL',
  '4': 'HIGH',
  '3': 'MEDIUM',
  '2': 'LOW',
  '1': 'INFORMATIONAL',
};

const SEVERITY_KEYWORDS: Array<[string, Severity]> = [
  ['CRIT', 'CRITICAL'],
  ['HIGH', 'HIGH'],
  ['MED', 'MEDIUM'],
  ['LOW', 'LOW'],
  ['INFO', 'INFORMATIONAL'],
];

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First of `keys` holding a string or number, as a string */
function pick(source: JsonObject, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

/**
 * Map a scanner severity (numeric code or free text) onto one of the five
 * buckets. Unrecognised values land in MEDIUM.
 */
export function normalizeSeverity(severity: unknown): Severity {
  const value = String(severity ?? '').trim().toUpperCase();

  const numeric = NUMERIC_SEVERITY[value];
  if (numeric) return numeric;

  for (const [keyword, bucket] of SEVERITY_KEYWORDS) {
    if (value.includes(keyword)) return bucket;
  }

  return 'MEDIUM';
}

/**
 * The scanner has emitted both `{ vulnerabilities: [...] }` and
 * `{ results: { vulnerabilities: [...] } }` across releases; neither shape is
 * documented as authoritative, so look at the top level first and then under
 * `results`.
 */
function lookupList(report: JsonObject, key: string): unknown[] {
  if (key in report) {
    const value = report[key];
    return Array.isArray(value) ? value : [];
  }
  const results = report.results;
  const nested = isObject(results) ? results[key] : undefined;
  return Array.isArray(nested) ? nested : [];
}

function toDetail(finding: JsonObject, severity: Severity): VulnerabilityDetail {
  const pkg = finding.package;
  return {
    id: pick(finding, 'qid', 'id'),
    cve: pick(finding, 'cve', 'cveId'),
    severity,
    title: pick(finding, 'title', 'name'),
    package: isObject(pkg) ? pick(pkg, 'name') : pick(finding, 'packageName'),
    version: isObject(pkg) ? pick(pkg, 'version') : pick(finding, 'packageVersion'),
    fixedVersion: pick(finding, 'fixedVersion', 'fix'),
  };
}

export function summarizeVulnerabilities(report: JsonObject): VulnerabilitySummary {
  const summary: VulnerabilitySummary = { counts: emptySeverityCounts(), total: 0, details: [] };

  for (const finding of lookupList(report, 'vulnerabilities')) {
    if (!isObject(finding)) continue;
    const severity = normalizeSeverity(finding.severity ?? 'UNKNOWN');
    summary.counts[severity] += 1;
    summary.total += 1;
    summary.details.push(toDetail(finding, severity));
  }

  return summary;
}

export function summarizeCompliance(report: JsonObject): ComplianceSummary {
  const summary: ComplianceSummary = { passed: 0, failed: 0, total: 0, checks: [] };

  for (const check of lookupList(report, 'compliance')) {
    if (!isObject(check)) continue;
    const status = String(check.status ?? '').toUpperCase();
    summary.total += 1;

    if (status === 'PASS' || status === 'PASSED') {
      summary.passed += 1;
    } else if (status === 'FAIL' || status === 'FAILED') {
      summary.failed += 1;
    }

    const entry: ComplianceCheck = {
      id: pick(check, 'id', 'checkId'),
      title: pick(check, 'title', 'name'),
      status,
      description: pick(check, 'description'),
    };
    summary.checks.push(entry);
  }

  return summary;
}

/**
 * Turn raw scanner output into a {@link ScanResult}.
 *
 * Never throws: output that is not a JSON object yields a PARSE_ERROR result
 * carrying the raw text and the decode error.
 */
export function interpretScanOutput(
  rawOutput: string,
  context: InterpretContext,
  log: Logger = defaultLogger
): ScanResult {
  const { reference } = context;
  const metadata = {
    registry: reference.registry,
    repository: reference.repository,
    tag: reference.tag,
    digest: reference.digest,
    scanTimestamp: context.now.toISOString(),
    scanner: SCANNER_NAME,
    jobName: context.jobName,
    executionName: context.executionName,
  };

  let report: unknown;
  let decodeError: string | undefined;
  try {
    report = JSON.parse(rawOutput);
  } catch (err) {
    decodeError = errorMessage(err);
  }
  if (decodeError === undefined && !isObject(report)) {
    decodeError = 'Scanner output is not a JSON object';
  }

  if (decodeError !== undefined || !isObject(report)) {
    log.error({ error: decodeError, image: reference.fullName }, 'Failed to parse scanner output as JSON');
    log.debug({ output: rawOutput.slice(0, 500) }, 'Unparsed scanner output');
    return {
      scanId: context.jobName,
      status: 'PARSE_ERROR',
      image: reference.fullName,
      vulnerabilities: { counts: emptySeverityCounts(), total: 0, details: [] },
      compliance: { passed: 0, failed: 0, total: 0, checks: [] },
      metadata,
      error: decodeError,
      rawOutput,
    };
  }

  const vulnerabilities = summarizeVulnerabilities(report);
  log.info(
    {
      image: reference.fullName,
      total: vulnerabilities.total,
      critical: vulnerabilities.counts.CRITICAL,
      high: vulnerabilities.counts.HIGH,
    },
    `Parsed ${vulnerabilities.total} vulnerabilities`
  );

  return {
    scanId: pick(report, 'scanId') ?? context.jobName,
    status: 'COMPLETED',
    image: reference.fullName,
    vulnerabilities,
    compliance: summarizeCompliance(report),
    metadata,
  };
}
