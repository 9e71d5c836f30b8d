/**
 * Sales data health checker
 *
 * The service cannot answer any sales query until the export has been
 * loaded, so this check is critical.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { SalesStore } from '@/modules/sales/index.js';

export interface SalesDataHealthCheckerOptions {
  /** Name to identify this check in results (default: 'sales-data') */
  name?: string;
}

export const makeSalesDataHealthChecker = (
  store: Pick<SalesStore, 'current'>,
  options: SalesDataHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'sales-data' } = options;

  return (): Promise<HealthCheckResult> => {
    const result = store.current();

    if (result.isErr()) {
      return Promise.resolve({
        name,
        status: 'unhealthy',
        message: result.error.message,
        critical: true,
      });
    }

    return Promise.resolve({
      name,
      status: 'healthy',
      message: `${String(result.value.records.length)} records loaded`,
      critical: true,
    });
  };
};
