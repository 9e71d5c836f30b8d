/**
 * Health checker factories
 */

export {
  makeSalesDataHealthChecker,
  type SalesDataHealthCheckerOptions,
} from './sales-data-checker.js';
