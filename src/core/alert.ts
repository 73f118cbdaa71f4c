import type { AlertThreshold, ScanResultRecord, Severity, SeverityCounts } from '../types.js';
import { bestEffort } from '../utils/best-effort.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface SecurityAlert {
  severity: Extract<Severity, 'CRITICAL' | 'HIGH'>;
  image: string;
  service?: string;
  vulnerabilities: SeverityCounts & { total: number };
  timestamp: string;
}

/**
 * Delivery channel for alerts (e.g. a Pub/Sub topic).
 */
export interface AlertPublisher {
  publish(alert: SecurityAlert): Promise<void>;
}

export function shouldAlert(counts: SeverityCounts, threshold: AlertThreshold): boolean {
  if (threshold === 'CRITICAL') {
    return counts.CRITICAL > 0;
  }
  return counts.CRITICAL > 0 || counts.HIGH > 0;
}

export function buildAlert(record: ScanResultRecord): SecurityAlert {
  const { counts, total } = record.vulnerabilities;
  return {
    severity: counts.CRITICAL > 0 ? 'CRITICAL' : 'HIGH',
    image: record.image,
    service: record.serviceName,
    vulnerabilities: { ...counts, total },
    timestamp: record.timestamp,
  };
}

/**
 * Logs a security alert and forwards it to the publisher, when one is
 * configured. Never throws.
 */
export class AlertDispatcher {
  private readonly publisher?: AlertPublisher;
  private readonly log: Logger;

  constructor(options: { publisher?: AlertPublisher; logger?: Logger } = {}) {
    this.publisher = options.publisher;
    this.log = (options.logger ?? defaultLogger).child({ component: 'alert' });
  }

  async send(record: ScanResultRecord): Promise<boolean> {
    const alert = buildAlert(record);
    this.log.warn(
      { image: alert.image, service: alert.service, vulnerabilities: alert.vulnerabilities },
      `SECURITY ALERT: ${alert.severity} severity vulnerabilities found in ${alert.image}`
    );

    const publisher = this.publisher;
    if (!publisher) {
      return false;
    }

    const published = await bestEffort(
      'Publish alert',
      async () => {
        await publisher.publish(alert);
        return true;
      },
      this.log
    );
    if (published) {
      this.log.info({ image: alert.image }, 'Alert published');
    }
    return published ?? false;
  }
}
