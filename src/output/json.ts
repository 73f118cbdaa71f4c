import type { BatchReport, BatchReportJson } from '../types.js';

/**
 * Convert a batch report to the CLI's JSON output format
 */
export function formatJsonOutput(report: BatchReport, scanDuration: number, now: Date = new Date()): BatchReportJson {
  const totalVulns = report.results.reduce((sum, r) => sum + r.vulnerabilities.total, 0);

  return {
    summary: {
      eventId: report.eventId,
      serviceName: report.serviceName,
      scanned: report.results.length,
      skipped: report.skipped.length,
      failed: report.failures.length,
      totalVulnerabilities: totalVulns,
      scanDuration: `${scanDuration}ms`,
      timestamp: now.toISOString(),
    },
    images: report.results.map((r) => ({
      image: r.image,
      originalImage: r.originalImage,
      scanId: r.scanId,
      status: r.status,
      counts: { ...r.vulnerabilities.counts },
      total: r.vulnerabilities.total,
      compliance: {
        passed: r.compliance.passed,
        failed: r.compliance.failed,
        total: r.compliance.total,
      },
      vulnerabilities: r.vulnerabilities.details,
    })),
    skipped: [...report.skipped],
    failures: [...report.failures],
  };
}
