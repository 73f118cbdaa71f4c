import { describe, it, expect } from 'vitest';
import { parseImageReference } from '../../src/core/image.js';
import {
  SCANNER_NAME,
  interpretScanOutput,
  normalizeSeverity,
  summarizeCompliance,
  summarizeVulnerabilities,
} from '../../src/core/interpreter.js';
import { FIXED_NOW, silentLogger } from '../helpers/fakes.js';

const context = {
  reference: parseImageReference('gcr.io/proj/app:v1'),
  jobName: 'qscanner-proj-app-v1-20240115103000',
  executionName: 'projects/p/locations/r/jobs/j/executions/e1',
  now: new Date(FIXED_NOW),
};

describe('core/interpreter', () => {
  describe('normalizeSeverity', () => {
    it('maps numeric codes 5..1', () => {
      expect(normalizeSeverity('5')).toBe('CRITICAL');
      expect(normalizeSeverity(4)).toBe('HIGH');
      expect(normalizeSeverity('3')).toBe('MEDIUM');
      expect(normalizeSeverity('2')).toBe('LOW');
      expect(normalizeSeverity(1)).toBe('INFORMATIONAL');
    });

    it('matches keywords case-insensitively', () => {
      expect(normalizeSeverity('critical')).toBe('CRITICAL');
      expect(normalizeSeverity(' High ')).toBe('HIGH');
      expect(normalizeSeverity('medium')).toBe('MEDIUM');
      expect(normalizeSeverity('Low')).toBe('LOW');
      expect(normalizeSeverity('info')).toBe('INFORMATIONAL');
    });

    it('falls back to MEDIUM for anything else', () => {
      expect(normalizeSeverity('UNKNOWN')).toBe('MEDIUM');
      expect(normalizeSeverity('9')).toBe('MEDIUM');
      expect(normalizeSeverity(undefined)).toBe('MEDIUM');
    });
  });

  describe('summarizeVulnerabilities', () => {
    it('counts findings per bucket and keeps details', () => {
      const summary = summarizeVulnerabilities({
        vulnerabilities: [
          { qid: 100, cve: 'CVE-2024-0001', severity: 5, title: 'Heap overflow', package: { name: 'openssl', version: '3.0.1' }, fixedVersion: '3.0.2' },
          { id: 'v2', severity: 'HIGH', packageName: 'zlib', packageVersion: '1.2' },
          { severity: 'low' },
          'not-an-object',
        ],
      });

      expect(summary.total).toBe(3);
      expect(summary.counts).toEqual({ CRITICAL: 1, HIGH: 1, MEDIUM: 0, LOW: 1, INFORMATIONAL: 0 });
      expect(summary.details[0]).toEqual({
        id: '100',
        cve: 'CVE-2024-0001',
        severity: 'CRITICAL',
        title: 'Heap overflow',
        package: 'openssl',
        version: '3.0.1',
        fixedVersion: '3.0.2',
      });
      expect(summary.details[1].package).toBe('zlib');
      expect(summary.details[1].version).toBe('1.2');
    });

    it('puts findings without a severity in MEDIUM', () => {
      const summary = summarizeVulnerabilities({ vulnerabilities: [{ title: 'x' }] });

      expect(summary.counts.MEDIUM).toBe(1);
    });

    it('reads the list nested under results', () => {
      const summary = summarizeVulnerabilities({ results: { vulnerabilities: [{ severity: '4' }] } });

      expect(summary.counts.HIGH).toBe(1);
    });

    it('prefers a top-level key over the nested one', () => {
      const summary = summarizeVulnerabilities({
        vulnerabilities: [],
        results: { vulnerabilities: [{ severity: '5' }] },
      });

      expect(summary.total).toBe(0);
    });
  });

  describe('summarizeCompliance', () => {
    it('counts pass and fail statuses', () => {
      const summary = summarizeCompliance({
        compliance: [
          { id: 'c1', status: 'pass' },
          { checkId: 'c2', status: 'FAILED', name: 'root user', description: 'runs as root' },
          { id: 'c3', status: 'SKIPPED' },
        ],
      });

      expect(summary.passed).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.total).toBe(3);
      expect(summary.checks[1]).toEqual({ id: 'c2', title: 'root user', status: 'FAILED', description: 'runs as root' });
    });
  });

  describe('interpretScanOutput', () => {
    it('builds a COMPLETED result', () => {
      const result = interpretScanOutput(
        JSON.stringify({ scanId: 'scan-42', vulnerabilities: [{ severity: '5' }] }),
        context,
        silentLogger
      );

      expect(result.status).toBe('COMPLETED');
      expect(result.scanId).toBe('scan-42');
      expect(result.image).toBe('gcr.io/proj/app:v1');
      expect(result.vulnerabilities.counts.CRITICAL).toBe(1);
      expect(result.metadata).toEqual({
        registry: 'gcr.io',
        repository: 'proj/app',
        tag: 'v1',
        digest: undefined,
        scanTimestamp: '2024-01-15T10:30:00.000Z',
        scanner: SCANNER_NAME,
        jobName: context.jobName,
        executionName: context.executionName,
      });
      expect(result.error).toBeUndefined();
    });

    it('falls back to the job name for the scan id', () => {
      const result = interpretScanOutput('{}', context, silentLogger);

      expect(result.scanId).toBe(context.jobName);
      expect(result.vulnerabilities.total).toBe(0);
      expect(result.compliance.total).toBe(0);
    });

    it('returns PARSE_ERROR for text that is not JSON', () => {
      const result = interpretScanOutput('scanner crashed', context, silentLogger);

      expect(result.status).toBe('PARSE_ERROR');
      expect(result.scanId).toBe(context.jobName);
      expect(result.rawOutput).toBe('scanner crashed');
      expect(result.error).toBeDefined();
      expect(result.vulnerabilities.total).toBe(0);
    });

    it('returns PARSE_ERROR for JSON that is not an object', () => {
      const result = interpretScanOutput('[1,2]', context, silentLogger);

      expect(result.status).toBe('PARSE_ERROR');
      expect(result.error).toBe('Scanner output is not a JSON object');
    });

    it('returns PARSE_ERROR for empty output', () => {
      expect(interpretScanOutput('', context, silentLogger).status).toBe('PARSE_ERROR');
    });
  });
});
