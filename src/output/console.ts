import chalk from 'chalk';
import { SEVERITIES, type BatchReport, type ScanResultRecord, type Severity } from '../types.js';

/**
 * Format a batch report for console output
 * Uses chalk for colored, human-readable formatting
 */
export function formatConsoleOutput(report: BatchReport, scanDuration: number): void {
  const scanned = report.results.length;
  console.log(
    chalk.cyan(
      `Scanned ${scanned} image${scanned !== 1 ? 's' : ''} for ${report.serviceName ?? 'unknown service'} in ${scanDuration}ms`
    )
  );

  for (const record of report.results) {
    printRecord(record);
  }

  if (report.skipped.length > 0) {
    console.log(chalk.dim(`\nSkipped (scanned recently): ${report.skipped.join(', ')}`));
  }

  if (report.failures.length > 0) {
    console.log(chalk.red(`\n✗ ${report.failures.length} image${report.failures.length !== 1 ? 's' : ''} failed:`));
    for (const failure of report.failures) {
      console.log(chalk.red(`  • ${failure.image}: ${failure.error}`));
    }
  }
}

function printRecord(record: ScanResultRecord): void {
  console.log(chalk.cyan(`\n${record.image}`) + chalk.dim(` [${record.scanId}]`));

  if (record.status === 'PARSE_ERROR') {
    console.log(chalk.yellow(`  ⚠ Scanner output could not be parsed: ${record.error ?? 'unknown error'}`));
    return;
  }

  const { counts, total, details } = record.vulnerabilities;
  if (total === 0) {
    console.log(chalk.green('  ✓ No vulnerabilities found'));
  } else {
    const breakdown = SEVERITIES.filter((s) => counts[s] > 0)
      .map((s) => severityToColor(s)(`${s}=${counts[s]}`))
      .join(' ');
    console.log(`  Found ${total} vulnerabilit${total !== 1 ? 'ies' : 'y'}: ${breakdown}`);
  }

  for (const v of details) {
    const title = v.title ?? v.cve ?? v.id ?? 'untitled finding';
    console.log(`  ${chalk.red('●')} ${title} ${severityToColor(v.severity)(`[${v.severity}]`)}`);
    if (v.cve) {
      console.log(chalk.dim(`    CVE: ${v.cve}`));
    }
    if (v.package) {
      console.log(chalk.dim(`    Package: ${v.package}${v.version ? `@${v.version}` : ''}`));
    }
    if (v.fixedVersion) {
      console.log(chalk.dim(`    Fix available: upgrade to ${v.fixedVersion}`));
    }
  }

  const { compliance } = record;
  if (compliance.total > 0) {
    console.log(chalk.dim(`  Compliance: ${compliance.passed} passed, ${compliance.failed} failed of ${compliance.total}`));
  }
}

function severityToColor(sev: Severity): (s: string) => string {
  if (sev === 'CRITICAL' || sev === 'HIGH') return chalk.red;
  if (sev === 'MEDIUM') return chalk.yellow;
  if (sev === 'LOW') return chalk.green;
  return chalk.dim;
}
